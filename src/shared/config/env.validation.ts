import * as Joi from 'joi';

/** Upper bound for CRAWL_HARD_MAX_PAGES; request DTOs cap list sizes with it. */
export const HARD_MAX_PAGES_LIMIT = 10_000;

export const validationSchema = Joi.object({
  // Shared
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  REDIS_HOST: Joi.string().allow('').optional(),
  REDIS_PORT: Joi.number().default(6379),

  // API
  PORT: Joi.number().default(3000),
  API_KEY: Joi.string().allow('').optional(),

  // Crawler
  CRAWLER_USER_AGENT: Joi.string().default(
    'CrawlDesk/1.0 (+https://example.invalid/bot)',
  ),
  CRAWL_DEFAULT_CONCURRENCY: Joi.number().integer().min(1).default(3),
  CRAWL_MAX_CONCURRENCY: Joi.number().integer().min(1).max(100).default(20),
  CRAWL_DEFAULT_MAX_PAGES: Joi.number().integer().min(1).default(50),
  CRAWL_DEFAULT_MAX_DEPTH: Joi.number().integer().min(0).default(2),
  CRAWL_HARD_MAX_PAGES: Joi.number().integer().min(1).max(HARD_MAX_PAGES_LIMIT).default(1000),
  REQUEST_TIMEOUT_MS: Joi.number().integer().min(1000).max(300000).default(30000),
  FETCH_MAX_RETRIES: Joi.number().integer().min(0).max(10).default(2),
  RETRY_BASE_DELAY_MS: Joi.number().integer().min(0).default(500),
  POLITENESS_DELAY_MS: Joi.number().integer().min(0).default(500),
  JOB_TIMEOUT_MS: Joi.number().integer().min(0).default(0),
  SYNC_WAIT_TIMEOUT_MS: Joi.number().integer().min(0).default(60000),
  JOB_RETENTION_MS: Joi.number().integer().min(0).default(3600000),
  JOB_SWEEP_INTERVAL_MS: Joi.number().integer().min(1000).default(60000),
  ROBOTS_CACHE_TTL_MS: Joi.number().integer().min(0).default(86400000),
  ROBOTS_FAILURE_TTL_MS: Joi.number().integer().min(0).default(600000),

  // Browser Service
  BROWSER_SERVICE_URL: Joi.string().uri().allow('').optional(),
  BROWSER_SERVICE_API_KEY: Joi.string().allow('').optional(),

  // Store
  STORE_DRIVER: Joi.string().valid('memory', 'postgres').default('memory'),
  DATABASE_URL: Joi.string().when('STORE_DRIVER', {
    is: 'postgres',
    then: Joi.required(),
    otherwise: Joi.allow('').optional(),
  }),

  // Language model
  GEMINI_API_KEY: Joi.string().allow('').optional(),
  GEMINI_DEFAULT_MODEL: Joi.string().default('gemini-2.0-flash'),
});
