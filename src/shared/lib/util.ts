export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

export const MAX_BACKOFF_MS = 30_000;

/**
 * Exponential backoff with up to 25% jitter: base * 2^attempt, capped.
 * `attempt` is zero-based (the delay before the first retry uses attempt 0).
 */
export function backoffDelay(
  attempt: number,
  baseMs: number,
  random: () => number = Math.random,
): number {
  const exponential = baseMs * 2 ** attempt;
  const jitter = exponential * 0.25 * random();
  return Math.min(MAX_BACKOFF_MS, Math.round(exponential + jitter));
}
