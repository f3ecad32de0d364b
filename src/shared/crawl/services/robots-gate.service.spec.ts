import { Cache, caching } from 'cache-manager';
import { DEFAULT_CRAWL_SETTINGS } from '@/shared/config/crawl-settings';
import {
  PARSED_ROBOTS_LIMIT,
  RobotsDownload,
  RobotsGateService,
} from './robots-gate.service';

class StubRobotsGate extends RobotsGateService {
  readonly downloads: string[] = [];
  readonly parses: string[] = [];

  constructor(
    cache: Cache,
    private readonly respond: () => Promise<RobotsDownload>,
  ) {
    super(cache, DEFAULT_CRAWL_SETTINGS);
  }

  protected override download(robotsUrl: string): Promise<RobotsDownload> {
    this.downloads.push(robotsUrl);
    return this.respond();
  }

  protected override parse(robotsUrl: string, body: string) {
    this.parses.push(robotsUrl);
    return super.parse(robotsUrl, body);
  }
}

const RULES = ['User-agent: *', 'Disallow: /private', '', 'User-agent: BadBot', 'Disallow: /'].join(
  '\n',
);

describe('RobotsGateService', () => {
  let cache: Cache;

  beforeEach(async () => {
    cache = await caching('memory');
  });

  it('applies disallow rules per user agent', async () => {
    const gate = new StubRobotsGate(cache, async () => ({ statusCode: 200, body: RULES }));

    await expect(gate.isAllowed('https://a.test/private/page', 'TestBot/1.0')).resolves.toBe(false);
    await expect(gate.isAllowed('https://a.test/public', 'TestBot/1.0')).resolves.toBe(true);
    await expect(gate.isAllowed('https://a.test/public', 'BadBot/2.0')).resolves.toBe(false);
    expect(gate.downloads).toEqual(['https://a.test/robots.txt']);
  });

  it('shares one download between concurrent lookups of an origin', async () => {
    let release: (download: RobotsDownload) => void = () => undefined;
    const pending = new Promise<RobotsDownload>((resolve) => {
      release = resolve;
    });
    const gate = new StubRobotsGate(cache, () => pending);

    const checks = Promise.all([
      gate.isAllowed('https://a.test/1', 'TestBot'),
      gate.isAllowed('https://a.test/2', 'TestBot'),
      gate.isAllowed('https://a.test/private', 'TestBot'),
    ]);
    release({ statusCode: 200, body: RULES });

    await expect(checks).resolves.toEqual([true, true, false]);
    expect(gate.downloads).toHaveLength(1);
  });

  it('fails open with the short TTL when robots.txt cannot be fetched', async () => {
    const setSpy = jest.spyOn(cache, 'set');
    const gate = new StubRobotsGate(cache, () => Promise.reject(new Error('ECONNRESET')));

    await expect(gate.isAllowed('https://down.test/anything', 'TestBot')).resolves.toBe(true);
    expect(setSpy).toHaveBeenCalledWith(
      'robots:https://down.test',
      '',
      DEFAULT_CRAWL_SETTINGS.robotsFailureTtlMs,
    );

    await gate.isAllowed('https://down.test/other', 'TestBot');
    expect(gate.downloads).toHaveLength(1);
  });

  it('treats a 5xx robots.txt as unavailable', async () => {
    const setSpy = jest.spyOn(cache, 'set');
    const gate = new StubRobotsGate(cache, async () => ({ statusCode: 503, body: RULES }));

    await expect(gate.isAllowed('https://a.test/private', 'TestBot')).resolves.toBe(true);
    expect(setSpy).toHaveBeenCalledWith(
      'robots:https://a.test',
      '',
      DEFAULT_CRAWL_SETTINGS.robotsFailureTtlMs,
    );
  });

  it('treats a missing robots.txt as no rules, cached normally', async () => {
    const setSpy = jest.spyOn(cache, 'set');
    const gate = new StubRobotsGate(cache, async () => ({ statusCode: 404, body: 'Not Found' }));

    await expect(gate.isAllowed('https://a.test/private', 'TestBot')).resolves.toBe(true);
    expect(setSpy).toHaveBeenCalledWith(
      'robots:https://a.test',
      '',
      DEFAULT_CRAWL_SETTINGS.robotsCacheTtlMs,
    );
  });

  it('reads robots.txt from the shared cache', async () => {
    await cache.set('robots:https://cached.test', 'User-agent: *\nDisallow: /', 60_000);
    const gate = new StubRobotsGate(cache, async () => ({ statusCode: 200, body: '' }));

    await expect(gate.isAllowed('https://cached.test/page', 'TestBot')).resolves.toBe(false);
    expect(gate.downloads).toEqual([]);
  });

  it('keeps a bounded number of parsed robots.txt files', async () => {
    cache = await caching('memory', { max: PARSED_ROBOTS_LIMIT * 2 });
    const gate = new StubRobotsGate(cache, async () => ({ statusCode: 200, body: RULES }));
    const origins = Array.from(
      { length: PARSED_ROBOTS_LIMIT + 1 },
      (_, i) => `https://site-${i}.test`,
    );

    for (const origin of origins) {
      await gate.isAllowed(`${origin}/page`, 'TestBot');
    }
    expect(gate.parses).toHaveLength(PARSED_ROBOTS_LIMIT + 1);

    await gate.isAllowed(`${origins[PARSED_ROBOTS_LIMIT]}/again`, 'TestBot');
    expect(gate.parses).toHaveLength(PARSED_ROBOTS_LIMIT + 1);

    await expect(gate.isAllowed(`${origins[0]}/private`, 'TestBot')).resolves.toBe(false);
    expect(gate.parses).toHaveLength(PARSED_ROBOTS_LIMIT + 2);
    expect(gate.parses[PARSED_ROBOTS_LIMIT + 1]).toBe('https://site-0.test/robots.txt');
    expect(gate.downloads).toHaveLength(PARSED_ROBOTS_LIMIT + 1);
  });
});
