export type CrawlMode = 'scrape' | 'search' | 'agent' | 'map' | 'crawl';

export const CRAWL_MODES: readonly CrawlMode[] = [
  'scrape',
  'search',
  'agent',
  'map',
  'crawl',
] as const;

export type OutputFormat = 'markdown' | 'text' | 'html';

export interface SelectorSpec {
  name: string;
  selector: string;
  attr?: string;
}

/**
 * Fields every mode may carry. `timeoutMs` bounds the whole job,
 * `delayMs` overrides the per-origin politeness delay.
 */
interface JobRequestBase {
  timeoutMs?: number;
  delayMs?: number;
}

export interface ScrapeJobRequest extends JobRequestBase {
  mode: 'scrape';
  url: string;
  format: OutputFormat;
  useBrowser: boolean;
  includeLinks: boolean;
  includeImages: boolean;
  selectors?: SelectorSpec[];
}

export interface CrawlJobRequest extends JobRequestBase {
  mode: 'crawl';
  urls: string[];
  format: OutputFormat;
  batchSize?: number;
  maxDepth: number;
  sameDomain: boolean;
  useBrowser: boolean;
  includeLinks: boolean;
  includeImages: boolean;
  selectors?: SelectorSpec[];
}

export interface MapJobRequest extends JobRequestBase {
  mode: 'map';
  url: string;
  maxDepth?: number;
  maxPages?: number;
  batchSize?: number;
  sameDomain: boolean;
  useBrowser: boolean;
  includeContent: boolean;
  format: OutputFormat;
  includePatterns: string[];
  excludePatterns: string[];
}

export interface SearchJobRequest extends JobRequestBase {
  mode: 'search';
  url: string;
  query: string;
  topK: number;
  useBrowser: boolean;
}

export interface AgentJobRequest extends JobRequestBase {
  mode: 'agent';
  url: string;
  instruction: string;
  model?: string;
  useBrowser: boolean;
}

export type JobRequest =
  | ScrapeJobRequest
  | CrawlJobRequest
  | MapJobRequest
  | SearchJobRequest
  | AgentJobRequest;
