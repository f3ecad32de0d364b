import { MAX_BACKOFF_MS, backoffDelay } from './util';

describe('backoffDelay', () => {
  it('doubles per attempt without jitter', () => {
    const noJitter = () => 0;
    expect(backoffDelay(0, 500, noJitter)).toBe(500);
    expect(backoffDelay(1, 500, noJitter)).toBe(1000);
    expect(backoffDelay(2, 500, noJitter)).toBe(2000);
  });

  it('adds at most 25% jitter', () => {
    expect(backoffDelay(1, 500, () => 1)).toBe(1250);
    expect(backoffDelay(0, 100, () => 0.5)).toBe(113);
  });

  it('is capped', () => {
    expect(backoffDelay(20, 500, () => 0)).toBe(MAX_BACKOFF_MS);
  });
});
