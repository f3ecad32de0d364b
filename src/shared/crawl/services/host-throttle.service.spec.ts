import { sleep } from '@/shared/lib/util';
import { HostThrottleService } from './host-throttle.service';

describe('HostThrottleService', () => {
  it('spaces fetches to the same origin by the delay', async () => {
    const throttle = new HostThrottleService();

    await throttle.acquire('https://a.test', 60);
    const first = throttle.lastFetchAt('https://a.test') ?? 0;
    await throttle.acquire('https://a.test', 60);
    const second = throttle.lastFetchAt('https://a.test') ?? 0;

    expect(second - first).toBeGreaterThanOrEqual(55);
  });

  it('serializes concurrent callers for one origin', async () => {
    const throttle = new HostThrottleService();
    const started = Date.now();

    await Promise.all([
      throttle.acquire('https://a.test', 40),
      throttle.acquire('https://a.test', 40),
      throttle.acquire('https://a.test', 40),
    ]);

    expect(Date.now() - started).toBeGreaterThanOrEqual(75);
  });

  it('does not delay different origins', async () => {
    const throttle = new HostThrottleService();
    const started = Date.now();

    await Promise.all([
      throttle.acquire('https://a.test', 500),
      throttle.acquire('https://b.test', 500),
    ]);

    expect(Date.now() - started).toBeLessThan(400);
    expect(throttle.lastFetchAt('https://c.test')).toBeUndefined();
  });

  it('forgets an idle origin once its delay has passed', async () => {
    const throttle = new HostThrottleService();

    await throttle.acquire('https://a.test', 30);
    expect(throttle.lastFetchAt('https://a.test')).toEqual(expect.any(Number));

    await sleep(80);
    expect(throttle.lastFetchAt('https://a.test')).toBeUndefined();
  });

  it('keeps an origin while another caller is queued on it', async () => {
    const throttle = new HostThrottleService();

    await throttle.acquire('https://a.test', 100);
    const queued = throttle.acquire('https://a.test', 100);
    await sleep(130);
    expect(throttle.lastFetchAt('https://a.test')).toEqual(expect.any(Number));

    await queued;
  });
});
