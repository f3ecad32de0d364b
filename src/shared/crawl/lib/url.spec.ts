import { hostOf, normalizeUrl, originOf } from './url';

describe('normalizeUrl', () => {
  it('lowercases scheme and host, drops default port, fragment and trailing slash', () => {
    expect(normalizeUrl('HTTP://Example.COM:80/a/?b=2&a=1#frag')).toBe(
      'http://example.com/a?a=1&b=2',
    );
  });

  it('keeps the root path slash', () => {
    expect(normalizeUrl('https://example.com')).toBe('https://example.com/');
    expect(normalizeUrl('https://example.com/')).toBe('https://example.com/');
  });

  it('keeps non-default ports', () => {
    expect(normalizeUrl('https://example.com:8443/x')).toBe('https://example.com:8443/x');
  });

  it('returns null for non-http schemes and garbage', () => {
    expect(normalizeUrl('ftp://example.com/file')).toBeNull();
    expect(normalizeUrl('mailto:someone@example.com')).toBeNull();
    expect(normalizeUrl('not a url')).toBeNull();
    expect(normalizeUrl('/relative/path')).toBeNull();
  });

  it('maps equivalent spellings to the same key', () => {
    expect(normalizeUrl('https://site.test/docs/')).toBe(normalizeUrl('https://SITE.test/docs#intro'));
  });
});

describe('originOf / hostOf', () => {
  it('splits a URL into origin and host', () => {
    expect(originOf('https://site.test:8080/a/b')).toBe('https://site.test:8080');
    expect(hostOf('https://site.test:8080/a/b')).toBe('site.test:8080');
  });
});
