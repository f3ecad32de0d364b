import { Inject, Injectable, Logger } from '@nestjs/common';
import { CRAWL_SETTINGS, CrawlSettings } from '@/shared/config/crawl-settings';
import {
  CollaboratorUnavailableError,
  CrawlError,
  RenderTimeoutError,
  errorMessage,
} from '@/shared/crawl/errors/crawl.errors';
import type {
  FetchOptions,
  FetchOutcome,
  FrontierEntry,
} from '@/shared/crawl/interfaces/fetch-outcome.interface';
import { discoverLinks } from '@/shared/crawl/lib/links';
import { originOf } from '@/shared/crawl/lib/url';
import { backoffDelay, sleep } from '@/shared/lib/util';
import {
  RENDERER,
  Renderer,
  RenderResult,
} from '@/shared/rendering/interfaces/renderer.interface';
import { HostThrottleService } from './host-throttle.service';
import { RobotsGateService, RobotsPolicy } from './robots-gate.service';

/**
 * Fetches one frontier entry: robots check, per-origin politeness, then the
 * Renderer with bounded retries. Page-level failures come back as outcomes;
 * only CollaboratorUnavailableError is thrown.
 */
@Injectable()
export class FetcherService {
  private readonly logger = new Logger(FetcherService.name);

  constructor(
    @Inject(RENDERER) private readonly renderer: Renderer,
    @Inject(RobotsGateService) private readonly robots: RobotsPolicy,
    private readonly throttle: HostThrottleService,
    @Inject(CRAWL_SETTINGS) private readonly settings: CrawlSettings,
  ) {}

  async fetch(entry: FrontierEntry, options: FetchOptions): Promise<FetchOutcome> {
    const startTime = Date.now();
    const outcome = (
      fields: Omit<FetchOutcome, 'url' | 'fetchedAt' | 'elapsedMs'>,
    ): FetchOutcome => ({
      url: entry.url,
      ...fields,
      fetchedAt: new Date().toISOString(),
      elapsedMs: Date.now() - startTime,
    });

    if (!(await this.robots.isAllowed(entry.url, options.userAgent))) {
      this.logger.debug(`Blocked by robots.txt: ${entry.url}`);
      return outcome({
        status: 'blocked_by_robots',
        error: 'blocked by robots.txt',
        attempts: 0,
      });
    }

    const origin = originOf(entry.url);
    const maxAttempts = this.settings.maxRetries + 1;
    let lastError: CrawlError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1) {
        await sleep(backoffDelay(attempt - 2, this.settings.retryBaseDelayMs));
      }
      await this.throttle.acquire(origin, options.delayMs);

      let result: RenderResult;
      try {
        result = await this.renderer.render({
          url: entry.url,
          userAgent: options.userAgent,
          timeoutMs: options.timeoutMs,
          useBrowser: options.useBrowser,
        });
      } catch (error) {
        if (
          error instanceof CollaboratorUnavailableError ||
          !(error instanceof CrawlError)
        ) {
          throw error;
        }
        lastError = error;
        this.logger.warn(
          `Attempt ${attempt}/${maxAttempts} failed for ${entry.url}: ${errorMessage(error)}`,
        );
        continue;
      }

      if (result.statusCode >= 400) {
        return outcome({
          status: 'http_error',
          statusCode: result.statusCode,
          finalUrl: result.finalUrl,
          error: `HTTP ${result.statusCode}`,
          attempts: attempt,
        });
      }

      return outcome({
        status: 'ok',
        statusCode: result.statusCode,
        finalUrl: result.finalUrl,
        html: result.html,
        links: options.discoverLinks
          ? discoverLinks(result.html, result.finalUrl)
          : undefined,
        attempts: attempt,
      });
    }

    if (lastError instanceof RenderTimeoutError) {
      return outcome({ status: 'timeout', error: 'timeout', attempts: maxAttempts });
    }
    return outcome({
      status: 'render_error',
      error: lastError?.message ?? 'render failed',
      attempts: maxAttempts,
    });
  }
}
