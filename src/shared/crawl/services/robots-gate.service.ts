import { Inject, Injectable, Logger } from '@nestjs/common';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Cache } from 'cache-manager';
import robotsParser from 'robots-parser';
import { CRAWL_SETTINGS, CrawlSettings } from '@/shared/config/crawl-settings';
import { errorMessage } from '@/shared/crawl/errors/crawl.errors';
import { originOf } from '@/shared/crawl/lib/url';
import { httpGet } from '@/shared/rendering/lib/http-get';

export type Robot = ReturnType<typeof robotsParser>;

export interface RobotsPolicy {
  isAllowed(url: string, userAgent: string): Promise<boolean>;
}

export interface RobotsDownload {
  statusCode: number;
  body: string;
}

const ALLOW_ALL = '';
const ROBOTS_TIMEOUT_MS = 10_000;
/** Parsed robots.txt kept in memory, least recently used evicted first. */
export const PARSED_ROBOTS_LIMIT = 500;

/**
 * robots.txt permission checks shared across jobs.
 *
 * The robots.txt body is cached per origin (key: robots:{origin}). Concurrent
 * lookups of an uncached origin share one download. If robots.txt cannot be
 * fetched (network error, timeout, 5xx) the origin is treated as allow-all for
 * ROBOTS_FAILURE_TTL_MS so an unreachable robots endpoint never stalls a crawl.
 * A 4xx robots.txt means no rules.
 */
@Injectable()
export class RobotsGateService implements RobotsPolicy {
  private readonly logger = new Logger(RobotsGateService.name);
  private readonly KEY_PREFIX = 'robots:';
  private readonly inFlight = new Map<string, Promise<string>>();
  private readonly parsed = new Map<string, { body: string; robot: Robot }>();

  constructor(
    @Inject(CACHE_MANAGER) private readonly cache: Cache,
    @Inject(CRAWL_SETTINGS) private readonly settings: CrawlSettings,
  ) {}

  async isAllowed(url: string, userAgent: string): Promise<boolean> {
    const origin = originOf(url);
    const body = await this.robotsBody(origin, userAgent);
    if (body === ALLOW_ALL) return true;

    return this.robotFor(origin, body).isAllowed(url, userAgent) ?? true;
  }

  /** Fetches robots.txt. Rejects on network failure. */
  protected async download(
    robotsUrl: string,
    userAgent: string,
  ): Promise<RobotsDownload> {
    const { statusCode, body } = await httpGet(robotsUrl, {
      userAgent,
      timeoutMs: ROBOTS_TIMEOUT_MS,
      accept: 'text/plain,*/*;q=0.8',
    });
    return { statusCode, body };
  }

  private robotsBody(origin: string, userAgent: string): Promise<string> {
    const pending = this.inFlight.get(origin);
    if (pending) return pending;

    const lookup = this.lookup(origin, userAgent).finally(() =>
      this.inFlight.delete(origin),
    );
    this.inFlight.set(origin, lookup);
    return lookup;
  }

  private async lookup(origin: string, userAgent: string): Promise<string> {
    const key = `${this.KEY_PREFIX}${origin}`;

    try {
      const cached = await this.cache.get<string>(key);
      if (cached !== undefined && cached !== null) return cached;
    } catch (error) {
      this.logger.warn(`Robots cache read failed for ${origin}: ${errorMessage(error)}`);
    }

    const robotsUrl = `${origin}/robots.txt`;
    let body: string;
    let ttl = this.settings.robotsCacheTtlMs;

    try {
      const response = await this.download(robotsUrl, userAgent);
      if (response.statusCode >= 500) {
        throw new Error(`HTTP ${response.statusCode}`);
      }
      body = response.statusCode >= 400 ? ALLOW_ALL : response.body;
      this.logger.debug(`Fetched ${robotsUrl} (${response.statusCode})`);
    } catch (error) {
      // Fail open
      this.logger.warn(
        `robots.txt unavailable for ${origin}, allowing all: ${errorMessage(error)}`,
      );
      body = ALLOW_ALL;
      ttl = this.settings.robotsFailureTtlMs;
    }

    try {
      await this.cache.set(key, body, ttl);
    } catch (error) {
      this.logger.warn(`Robots cache write failed for ${origin}: ${errorMessage(error)}`);
    }
    return body;
  }

  protected parse(robotsUrl: string, body: string): Robot {
    return robotsParser(robotsUrl, body);
  }

  private robotFor(origin: string, body: string): Robot {
    const memo = this.parsed.get(origin);
    this.parsed.delete(origin);
    if (memo && memo.body === body) {
      this.parsed.set(origin, memo);
      return memo.robot;
    }

    const robot = this.parse(`${origin}/robots.txt`, body);
    this.parsed.set(origin, { body, robot });
    if (this.parsed.size > PARSED_ROBOTS_LIMIT) {
      const oldest = this.parsed.keys().next();
      if (!oldest.done) this.parsed.delete(oldest.value);
    }
    return robot;
  }
}
