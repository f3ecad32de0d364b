import { ConfigService } from '@nestjs/config';

export const CRAWL_SETTINGS = Symbol('CRAWL_SETTINGS');

export interface CrawlSettings {
  userAgent: string;
  defaultConcurrency: number;
  maxConcurrency: number;
  defaultMaxPages: number;
  defaultMaxDepth: number;
  hardMaxPages: number;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  politenessDelayMs: number;
  jobTimeoutMs: number;
  syncWaitTimeoutMs: number;
  jobRetentionMs: number;
  jobSweepIntervalMs: number;
  robotsCacheTtlMs: number;
  robotsFailureTtlMs: number;
  defaultModel: string;
}

export const DEFAULT_CRAWL_SETTINGS: CrawlSettings = {
  userAgent: 'CrawlDesk/1.0 (+https://example.invalid/bot)',
  defaultConcurrency: 3,
  maxConcurrency: 20,
  defaultMaxPages: 50,
  defaultMaxDepth: 2,
  hardMaxPages: 1000,
  requestTimeoutMs: 30000,
  maxRetries: 2,
  retryBaseDelayMs: 500,
  politenessDelayMs: 500,
  jobTimeoutMs: 0,
  syncWaitTimeoutMs: 60000,
  jobRetentionMs: 3600000,
  jobSweepIntervalMs: 60000,
  robotsCacheTtlMs: 86400000,
  robotsFailureTtlMs: 600000,
  defaultModel: 'gemini-2.0-flash',
};

export function crawlSettingsFactory(config: ConfigService): CrawlSettings {
  const d = DEFAULT_CRAWL_SETTINGS;
  const num = (key: string, fallback: number): number =>
    Number(config.get<number>(key) ?? fallback);

  return {
    userAgent: config.get<string>('CRAWLER_USER_AGENT') ?? d.userAgent,
    defaultConcurrency: num('CRAWL_DEFAULT_CONCURRENCY', d.defaultConcurrency),
    maxConcurrency: num('CRAWL_MAX_CONCURRENCY', d.maxConcurrency),
    defaultMaxPages: num('CRAWL_DEFAULT_MAX_PAGES', d.defaultMaxPages),
    defaultMaxDepth: num('CRAWL_DEFAULT_MAX_DEPTH', d.defaultMaxDepth),
    hardMaxPages: num('CRAWL_HARD_MAX_PAGES', d.hardMaxPages),
    requestTimeoutMs: num('REQUEST_TIMEOUT_MS', d.requestTimeoutMs),
    maxRetries: num('FETCH_MAX_RETRIES', d.maxRetries),
    retryBaseDelayMs: num('RETRY_BASE_DELAY_MS', d.retryBaseDelayMs),
    politenessDelayMs: num('POLITENESS_DELAY_MS', d.politenessDelayMs),
    jobTimeoutMs: num('JOB_TIMEOUT_MS', d.jobTimeoutMs),
    syncWaitTimeoutMs: num('SYNC_WAIT_TIMEOUT_MS', d.syncWaitTimeoutMs),
    jobRetentionMs: num('JOB_RETENTION_MS', d.jobRetentionMs),
    jobSweepIntervalMs: num('JOB_SWEEP_INTERVAL_MS', d.jobSweepIntervalMs),
    robotsCacheTtlMs: num('ROBOTS_CACHE_TTL_MS', d.robotsCacheTtlMs),
    robotsFailureTtlMs: num('ROBOTS_FAILURE_TTL_MS', d.robotsFailureTtlMs),
    defaultModel: config.get<string>('GEMINI_DEFAULT_MODEL') ?? d.defaultModel,
  };
}
