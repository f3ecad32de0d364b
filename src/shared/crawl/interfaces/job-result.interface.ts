import type { CrawlMode, JobRequest } from './job-request.interface';
import type { FetchStatus } from './fetch-outcome.interface';

export type JobStatus =
  | 'pending'
  | 'running'
  | 'completed'
  | 'failed'
  | 'cancelled';

export const TERMINAL_STATUSES: readonly JobStatus[] = [
  'completed',
  'failed',
  'cancelled',
];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface PageMetadata {
  title: string;
  description: string;
  author: string;
  keywords: string;
  favicon: string;
  url: string;
}

export interface LinkRef {
  url: string;
  text: string;
  internal: boolean;
}

export interface ImageRef {
  src: string;
  alt: string;
  title: string;
}

export interface ScoredPassage {
  text: string;
  score: number;
}

export interface PageResult {
  url: string;
  depth: number;
  parent: string | null;
  sequence: number;
  status: FetchStatus;
  statusCode?: number;
  content?: string;
  metadata?: PageMetadata;
  links?: LinkRef[];
  linksCount?: number;
  images?: ImageRef[];
  fields?: Record<string, string[]>;
  matches?: ScoredPassage[];
  totalPassages?: number;
  extracted?: JsonValue;
  error?: string;
  fetchedAt: string;
  elapsedMs: number;
  attempts: number;
}

export interface JobCounts {
  attempted: number;
  succeeded: number;
  failed: number;
  skippedByRobots: number;
  discovered: number;
}

export interface JobResult {
  id: string;
  mode: CrawlMode;
  request: JobRequest;
  status: JobStatus;
  pages: PageResult[];
  counts: JobCounts;
  error?: string;
  cancelReason?: string;
  persistError?: string;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
}

/** A JobResult without its page list and request, as listed by the registry. */
export type JobSummary = Omit<JobResult, 'pages' | 'request'> & {
  pageCount: number;
};
