export type FetchStatus =
  | 'ok'
  | 'http_error'
  | 'timeout'
  | 'blocked_by_robots'
  | 'render_error';

export interface FrontierEntry {
  url: string;
  depth: number;
  parent: string | null;
  // Discovery order within the job, used to rebuild BFS order.
  sequence: number;
}

export interface FetchOutcome {
  url: string;
  status: FetchStatus;
  statusCode?: number;
  finalUrl?: string;
  html?: string;
  links?: string[];
  error?: string;
  fetchedAt: string;
  elapsedMs: number;
  attempts: number;
}

export interface FetchOptions {
  useBrowser: boolean;
  userAgent: string;
  timeoutMs: number;
  delayMs: number;
  discoverLinks: boolean;
}
