import { errors, request } from 'undici';
import { FetchError } from '@/shared/crawl/errors/crawl.errors';

const MAX_REDIRECTS = 5;

export interface HttpGetOptions {
  userAgent: string;
  timeoutMs: number;
  accept?: string;
}

export interface HttpGetResult {
  statusCode: number;
  body: string;
  finalUrl: string;
}

/**
 * GET with manual redirect following so the caller learns the final URL.
 * A redirect that cannot be followed (no Location, or more than MAX_REDIRECTS)
 * rejects with FetchError.
 */
export async function httpGet(
  url: string,
  options: HttpGetOptions,
): Promise<HttpGetResult> {
  const { userAgent, timeoutMs } = options;
  const signal = AbortSignal.timeout(timeoutMs);
  let current = url;

  for (let redirects = 0; ; redirects++) {
    const response = await request(current, {
      method: 'GET',
      headers: {
        'User-Agent': userAgent,
        Accept: options.accept ?? '*/*',
        'Accept-Language': 'en-US,en;q=0.9',
      },
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
      signal,
    });

    if (response.statusCode >= 300 && response.statusCode < 400) {
      const location = response.headers.location;
      await response.body.dump();
      if (typeof location !== 'string') {
        throw new FetchError(`HTTP ${response.statusCode} without a Location header from ${current}`);
      }
      if (redirects >= MAX_REDIRECTS) {
        throw new FetchError(`More than ${MAX_REDIRECTS} redirects fetching ${url}`);
      }
      current = new URL(location, current).toString();
      continue;
    }

    const body = await response.body.text();
    return { statusCode: response.statusCode, body, finalUrl: current };
  }
}

export function isTimeoutError(error: unknown): boolean {
  return (
    error instanceof errors.HeadersTimeoutError ||
    error instanceof errors.BodyTimeoutError ||
    error instanceof errors.ConnectTimeoutError ||
    error instanceof errors.RequestAbortedError ||
    (error instanceof Error && error.name === 'TimeoutError')
  );
}
