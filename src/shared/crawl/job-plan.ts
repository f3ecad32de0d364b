import type { CrawlSettings } from '@/shared/config/crawl-settings';
import { JobConfigError } from './errors/crawl.errors';
import type { FrontierPolicy } from './frontier';
import type { FetchOptions } from './interfaces/fetch-outcome.interface';
import type {
  CrawlMode,
  JobRequest,
} from './interfaces/job-request.interface';
import { hostOf, normalizeUrl } from './lib/url';

/** Everything a JobCoordinator needs, resolved from a request and the service settings. */
export interface CrawlPlan {
  mode: CrawlMode;
  seeds: string[];
  frontier: FrontierPolicy;
  maxPages: number;
  concurrency: number;
  fetch: FetchOptions;
  jobTimeoutMs: number;
}

export function buildCrawlPlan(
  request: JobRequest,
  settings: CrawlSettings,
): CrawlPlan {
  const problems: string[] = [];
  const plan = planFor(request, settings, problems);

  if (problems.length > 0) {
    throw new JobConfigError(`Invalid ${request.mode} request`, problems);
  }
  return plan;
}

function planFor(
  request: JobRequest,
  settings: CrawlSettings,
  problems: string[],
): CrawlPlan {
  const common = commonOptions(request, settings, problems);

  switch (request.mode) {
    case 'scrape':
    case 'search':
    case 'agent': {
      if (request.mode === 'search' && !request.query.trim()) {
        problems.push('query must not be empty');
      }
      if (request.mode === 'search' && !(request.topK >= 1)) {
        problems.push('top_k must be at least 1');
      }
      if (request.mode === 'agent' && !request.instruction.trim()) {
        problems.push('instruction must not be empty');
      }
      return singlePage(request.mode, request.url, request.useBrowser, common, problems);
    }

    case 'crawl': {
      if (request.urls.length === 0) problems.push('urls must not be empty');
      checkDepth(request.maxDepth, problems);
      const seeds = seedsOf(request.urls, problems);
      if (seeds.length > settings.hardMaxPages) {
        problems.push(`urls must not contain more than ${settings.hardMaxPages} URLs`);
      }
      return {
        mode: 'crawl',
        seeds,
        frontier: {
          maxDepth: request.maxDepth,
          sameDomain: request.sameDomain,
          seedHosts: seeds.map(hostOf),
        },
        maxPages: settings.hardMaxPages,
        concurrency: concurrencyOf(request.batchSize, settings, problems),
        fetch: {
          ...common,
          useBrowser: request.useBrowser,
          discoverLinks: request.maxDepth > 0,
        },
        jobTimeoutMs: common.jobTimeoutMs,
      };
    }

    case 'map': {
      const maxDepth = request.maxDepth ?? settings.defaultMaxDepth;
      const maxPages = request.maxPages ?? settings.defaultMaxPages;
      checkDepth(maxDepth, problems);
      if (!Number.isInteger(maxPages) || maxPages < 1) {
        problems.push('max_pages must be a positive integer');
      } else if (maxPages > settings.hardMaxPages) {
        problems.push(`max_pages must not exceed ${settings.hardMaxPages}`);
      }
      const seeds = seedsOf([request.url], problems);
      return {
        mode: 'map',
        seeds,
        frontier: {
          maxDepth,
          sameDomain: request.sameDomain,
          seedHosts: seeds.map(hostOf),
          includePatterns: compilePatterns('include_patterns', request.includePatterns, problems),
          excludePatterns: compilePatterns('exclude_patterns', request.excludePatterns, problems),
        },
        maxPages,
        concurrency: concurrencyOf(request.batchSize, settings, problems),
        fetch: { ...common, useBrowser: request.useBrowser, discoverLinks: true },
        jobTimeoutMs: common.jobTimeoutMs,
      };
    }
  }
}

interface CommonOptions {
  userAgent: string;
  timeoutMs: number;
  delayMs: number;
  jobTimeoutMs: number;
}

function commonOptions(
  request: JobRequest,
  settings: CrawlSettings,
  problems: string[],
): CommonOptions {
  if (request.timeoutMs !== undefined && request.timeoutMs < 0) {
    problems.push('timeout_ms must not be negative');
  }
  if (request.delayMs !== undefined && request.delayMs < 0) {
    problems.push('delay_ms must not be negative');
  }
  return {
    userAgent: settings.userAgent,
    timeoutMs: settings.requestTimeoutMs,
    delayMs: request.delayMs ?? settings.politenessDelayMs,
    jobTimeoutMs: request.timeoutMs ?? settings.jobTimeoutMs,
  };
}

function singlePage(
  mode: CrawlMode,
  url: string,
  useBrowser: boolean,
  common: CommonOptions,
  problems: string[],
): CrawlPlan {
  const seeds = seedsOf([url], problems);
  return {
    mode,
    seeds,
    frontier: { maxDepth: 0, sameDomain: false, seedHosts: seeds.map(hostOf) },
    maxPages: 1,
    concurrency: 1,
    fetch: { ...common, useBrowser, discoverLinks: false },
    jobTimeoutMs: common.jobTimeoutMs,
  };
}

function seedsOf(urls: string[], problems: string[]): string[] {
  const seeds: string[] = [];
  for (const url of urls) {
    const normalized = normalizeUrl(url);
    if (!normalized) {
      problems.push(`not an absolute http(s) URL: ${url}`);
    } else if (!seeds.includes(normalized)) {
      seeds.push(normalized);
    }
  }
  return seeds;
}

function checkDepth(depth: number, problems: string[]): void {
  if (!Number.isInteger(depth) || depth < 0) {
    problems.push('max_depth must be a non-negative integer');
  }
}

function concurrencyOf(
  batchSize: number | undefined,
  settings: CrawlSettings,
  problems: string[],
): number {
  const requested = batchSize ?? settings.defaultConcurrency;
  if (!Number.isInteger(requested) || requested < 1) {
    problems.push('batch_size must be a positive integer');
    return 1;
  }
  return Math.min(requested, settings.maxConcurrency);
}

function compilePatterns(
  field: string,
  patterns: string[],
  problems: string[],
): RegExp[] {
  const compiled: RegExp[] = [];
  for (const pattern of patterns) {
    try {
      compiled.push(new RegExp(pattern));
    } catch {
      problems.push(`${field} contains an invalid pattern: ${pattern}`);
    }
  }
  return compiled;
}
