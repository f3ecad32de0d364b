import { DEFAULT_CRAWL_SETTINGS } from '@/shared/config/crawl-settings';
import { JobConfigError } from './errors/crawl.errors';
import type { JobRequest } from './interfaces/job-request.interface';
import { buildCrawlPlan } from './job-plan';

const settings = DEFAULT_CRAWL_SETTINGS;

function configProblems(request: JobRequest): string[] {
  try {
    buildCrawlPlan(request, settings);
  } catch (error) {
    if (error instanceof JobConfigError) return error.details;
    throw error;
  }
  throw new Error('expected a JobConfigError');
}

describe('buildCrawlPlan', () => {
  it('plans a single page for scrape', () => {
    const plan = buildCrawlPlan(
      {
        mode: 'scrape',
        url: 'https://a.test',
        format: 'markdown',
        useBrowser: false,
        includeLinks: false,
        includeImages: false,
      },
      settings,
    );

    expect(plan).toEqual({
      mode: 'scrape',
      seeds: ['https://a.test/'],
      frontier: { maxDepth: 0, sameDomain: false, seedHosts: ['a.test'] },
      maxPages: 1,
      concurrency: 1,
      fetch: {
        userAgent: settings.userAgent,
        timeoutMs: 30000,
        delayMs: 500,
        jobTimeoutMs: 0,
        useBrowser: false,
        discoverLinks: false,
      },
      jobTimeoutMs: 0,
    });
  });

  it('deduplicates crawl seeds and caps the batch size', () => {
    const plan = buildCrawlPlan(
      {
        mode: 'crawl',
        urls: ['https://a.test/x', 'https://a.test/x/', 'https://b.test'],
        format: 'text',
        batchSize: 50,
        maxDepth: 0,
        sameDomain: false,
        useBrowser: false,
        includeLinks: false,
        includeImages: false,
      },
      settings,
    );

    expect(plan.seeds).toEqual(['https://a.test/x', 'https://b.test/']);
    expect(plan.concurrency).toBe(settings.maxConcurrency);
    expect(plan.maxPages).toBe(settings.hardMaxPages);
    expect(plan.fetch.discoverLinks).toBe(false);
  });

  it('refuses a crawl with more seeds than the page ceiling', () => {
    const urls = Array.from(
      { length: settings.hardMaxPages + 5 },
      (_, i) => `https://a.test/page-${i}`,
    );

    expect(
      configProblems({
        mode: 'crawl',
        urls,
        format: 'markdown',
        maxDepth: 0,
        sameDomain: false,
        useBrowser: false,
        includeLinks: false,
        includeImages: false,
      }),
    ).toEqual([`urls must not contain more than ${settings.hardMaxPages} URLs`]);
  });

  it('accepts a crawl with exactly as many seeds as the page ceiling', () => {
    const urls = Array.from(
      { length: settings.hardMaxPages },
      (_, i) => `https://a.test/page-${i}`,
    );

    const plan = buildCrawlPlan(
      {
        mode: 'crawl',
        urls,
        format: 'markdown',
        maxDepth: 0,
        sameDomain: false,
        useBrowser: false,
        includeLinks: false,
        includeImages: false,
      },
      settings,
    );

    expect(plan.seeds).toHaveLength(settings.hardMaxPages);
  });

  it('follows links in crawl mode only when max depth is positive', () => {
    const plan = buildCrawlPlan(
      {
        mode: 'crawl',
        urls: ['https://a.test/'],
        format: 'markdown',
        maxDepth: 1,
        sameDomain: true,
        useBrowser: true,
        includeLinks: false,
        includeImages: false,
      },
      settings,
    );

    expect(plan.fetch.discoverLinks).toBe(true);
    expect(plan.fetch.useBrowser).toBe(true);
    expect(plan.concurrency).toBe(settings.defaultConcurrency);
    expect(plan.frontier).toEqual({ maxDepth: 1, sameDomain: true, seedHosts: ['a.test'] });
  });

  it('fills map defaults and compiles patterns', () => {
    const plan = buildCrawlPlan(
      {
        mode: 'map',
        url: 'https://a.test/',
        sameDomain: true,
        useBrowser: false,
        includeContent: false,
        format: 'markdown',
        includePatterns: ['/docs/'],
        excludePatterns: [],
        timeoutMs: 120000,
        delayMs: 0,
      },
      settings,
    );

    expect(plan.maxPages).toBe(50);
    expect(plan.frontier.maxDepth).toBe(2);
    expect(plan.frontier.includePatterns).toEqual([/\/docs\//]);
    expect(plan.fetch.discoverLinks).toBe(true);
    expect(plan.fetch.delayMs).toBe(0);
    expect(plan.jobTimeoutMs).toBe(120000);
  });

  it('reports every problem of an invalid map request at once', () => {
    expect(
      configProblems({
        mode: 'map',
        url: 'ftp://a.test/',
        maxPages: 0,
        sameDomain: true,
        useBrowser: false,
        includeContent: false,
        format: 'markdown',
        includePatterns: ['('],
        excludePatterns: [],
      }),
    ).toEqual([
      'max_pages must be a positive integer',
      'not an absolute http(s) URL: ftp://a.test/',
      'include_patterns contains an invalid pattern: (',
    ]);
  });

  it('rejects max_pages above the hard ceiling', () => {
    expect(
      configProblems({
        mode: 'map',
        url: 'https://a.test/',
        maxPages: 5000,
        sameDomain: true,
        useBrowser: false,
        includeContent: false,
        format: 'markdown',
        includePatterns: [],
        excludePatterns: [],
      }),
    ).toEqual(['max_pages must not exceed 1000']);
  });

  it('rejects empty queries, instructions and url lists', () => {
    expect(
      configProblems({ mode: 'search', url: 'https://a.test/', query: '  ', topK: 0, useBrowser: false }),
    ).toEqual(['query must not be empty', 'top_k must be at least 1']);

    expect(
      configProblems({ mode: 'agent', url: 'https://a.test/', instruction: '', useBrowser: false }),
    ).toEqual(['instruction must not be empty']);

    expect(
      configProblems({
        mode: 'crawl',
        urls: [],
        format: 'markdown',
        maxDepth: -1,
        sameDomain: false,
        useBrowser: false,
        includeLinks: false,
        includeImages: false,
      }),
    ).toEqual(['urls must not be empty', 'max_depth must be a non-negative integer']);
  });

  it('rejects negative timeouts and delays', () => {
    expect(
      configProblems({
        mode: 'scrape',
        url: 'https://a.test/',
        format: 'html',
        useBrowser: false,
        includeLinks: false,
        includeImages: false,
        timeoutMs: -1,
        delayMs: -5,
      }),
    ).toEqual(['timeout_ms must not be negative', 'delay_ms must not be negative']);
  });
});
