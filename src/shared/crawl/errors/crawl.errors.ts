export type CrawlErrorCode =
  | 'FETCH_ERROR'
  | 'RENDER_TIMEOUT'
  | 'RENDER_ERROR'
  | 'EXTRACTION_ERROR'
  | 'JOB_CONFIG_ERROR'
  | 'JOB_INTERNAL_ERROR'
  | 'COLLABORATOR_UNAVAILABLE'
  | 'JOB_NOT_FOUND'
  | 'JOB_WAIT_TIMEOUT';

export abstract class CrawlError extends Error {
  abstract readonly code: CrawlErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network-level failure talking to a page. Retryable. */
export class FetchError extends CrawlError {
  readonly code: CrawlErrorCode = 'FETCH_ERROR';
}

export class RenderTimeoutError extends FetchError {
  readonly code: CrawlErrorCode = 'RENDER_TIMEOUT';

  constructor(url: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(`Timed out after ${timeoutMs}ms fetching ${url}`, options);
  }
}

/** Renderer-side failure (bad response from the browser service, unreadable body). Retryable. */
export class RenderError extends CrawlError {
  readonly code = 'RENDER_ERROR';
}

export class ExtractionError extends CrawlError {
  readonly code = 'EXTRACTION_ERROR';
}

export class JobConfigError extends CrawlError {
  readonly code = 'JOB_CONFIG_ERROR';

  constructor(
    message: string,
    readonly details: string[] = [],
  ) {
    super(message);
  }
}

export class JobInternalError extends CrawlError {
  readonly code = 'JOB_INTERNAL_ERROR';
}

/**
 * A collaborator (renderer, language model) that cannot serve any request.
 * Not retried; fails the whole job.
 */
export class CollaboratorUnavailableError extends CrawlError {
  readonly code = 'COLLABORATOR_UNAVAILABLE';

  constructor(
    readonly collaborator: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class JobNotFoundError extends CrawlError {
  readonly code = 'JOB_NOT_FOUND';

  constructor(readonly jobId: string) {
    super(`Job ${jobId} not found`);
  }
}

export class JobWaitTimeoutError extends CrawlError {
  readonly code = 'JOB_WAIT_TIMEOUT';

  constructor(
    readonly jobId: string,
    timeoutMs: number,
  ) {
    super(`Job ${jobId} did not finish within ${timeoutMs}ms`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
