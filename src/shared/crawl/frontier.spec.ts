import { Frontier } from './frontier';

function frontier(overrides: Partial<ConstructorParameters<typeof Frontier>[0]> = {}) {
  return new Frontier({
    maxDepth: 2,
    sameDomain: false,
    seedHosts: ['a.test'],
    ...overrides,
  });
}

describe('Frontier', () => {
  it('deduplicates on the normalized URL', () => {
    const f = frontier();

    expect(f.push('https://a.test/x/', 0, null)).toBe(true);
    expect(f.push('https://A.test/x#part', 0, null)).toBe(false);
    expect(f.size()).toBe(1);
    expect(f.seenCount()).toBe(1);
  });

  it('pops shallowest first, FIFO within a depth', () => {
    const f = frontier();
    f.push('https://a.test/deep', 2, 'https://a.test/p');
    f.push('https://a.test/one', 1, 'https://a.test/');
    f.push('https://a.test/', 0, null);
    f.push('https://a.test/two', 1, 'https://a.test/');

    expect(f.peekDepth()).toBe(0);
    const order = [f.pop(), f.pop(), f.pop(), f.pop()].map((entry) => entry?.url);
    expect(order).toEqual([
      'https://a.test/',
      'https://a.test/one',
      'https://a.test/two',
      'https://a.test/deep',
    ]);
    expect(f.pop()).toBeUndefined();
    expect(f.peekDepth()).toBeUndefined();
  });

  it('records depth, parent and discovery sequence', () => {
    const f = frontier();
    f.push('https://a.test/', 0, null);
    f.push('https://a.test/child', 1, 'https://a.test/');
    f.pop();

    expect(f.pop()).toEqual({
      url: 'https://a.test/child',
      depth: 1,
      parent: 'https://a.test/',
      sequence: 1,
    });
  });

  it('rejects entries beyond max depth and non-http URLs', () => {
    const f = frontier({ maxDepth: 1 });

    expect(f.push('https://a.test/too-deep', 2, 'https://a.test/')).toBe(false);
    expect(f.push('mailto:someone@a.test', 1, 'https://a.test/')).toBe(false);
    expect(f.size()).toBe(0);
  });

  it('keeps discovered links on the seed hosts when sameDomain is set', () => {
    const f = frontier({ sameDomain: true });

    expect(f.push('https://b.test/', 1, 'https://a.test/')).toBe(false);
    expect(f.push('https://a.test/in', 1, 'https://a.test/')).toBe(true);
  });

  it('applies include and exclude patterns to discovered links only', () => {
    const f = frontier({
      includePatterns: [/\/blog\//],
      excludePatterns: [/draft/],
    });

    expect(f.push('https://a.test/', 0, null)).toBe(true);
    expect(f.push('https://a.test/blog/first', 1, 'https://a.test/')).toBe(true);
    expect(f.push('https://a.test/blog/draft-2', 1, 'https://a.test/')).toBe(false);
    expect(f.push('https://a.test/about', 1, 'https://a.test/')).toBe(false);
  });

  it('clear drops queued entries but keeps them seen', () => {
    const f = frontier();
    f.push('https://a.test/', 0, null);
    f.push('https://a.test/x', 1, 'https://a.test/');

    expect(f.clear()).toBe(2);
    expect(f.size()).toBe(0);
    expect(f.peekDepth()).toBeUndefined();
    expect(f.push('https://a.test/x', 1, 'https://a.test/')).toBe(false);
    expect(f.seenCount()).toBe(2);
  });
});
