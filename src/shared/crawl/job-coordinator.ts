import { Logger } from '@nestjs/common';
import type { ExtractorService } from '@/shared/extraction/extractor.service';
import type { JobStore } from '@/shared/store/interfaces/job-store.interface';
import {
  CollaboratorUnavailableError,
  CrawlError,
  ExtractionError,
  JobInternalError,
  JobWaitTimeoutError,
  errorMessage,
} from './errors/crawl.errors';
import { Frontier } from './frontier';
import type {
  FetchOutcome,
  FrontierEntry,
} from './interfaces/fetch-outcome.interface';
import type { JobRequest } from './interfaces/job-request.interface';
import type {
  JobCounts,
  JobResult,
  JobStatus,
  JobSummary,
  PageResult,
} from './interfaces/job-result.interface';
import { TERMINAL_STATUSES } from './interfaces/job-result.interface';
import type { CrawlPlan } from './job-plan';
import type { FetcherService } from './services/fetcher.service';

export interface JobCoordinatorDeps {
  fetcher: Pick<FetcherService, 'fetch'>;
  extractor: ExtractorService;
  store: JobStore;
}

type PagePayload = Omit<
  PageResult,
  | 'url'
  | 'depth'
  | 'parent'
  | 'sequence'
  | 'status'
  | 'statusCode'
  | 'error'
  | 'fetchedAt'
  | 'elapsedMs'
  | 'attempts'
>;

/**
 * Runs one job: owns its Frontier, a pool of workers and the page results.
 *
 * Workers pop from the Frontier until it is empty and no worker is fetching
 * (a fetch in flight may still push links). A worker waits instead of popping
 * an entry while a shallower page that could discover entries ahead of it is
 * in flight, which keeps max_pages truncation breadth-first.
 */
export class JobCoordinator {
  private readonly logger = new Logger(JobCoordinator.name);
  private readonly request: JobRequest;
  private readonly frontier: Frontier;
  private readonly pages = new Map<string, PageResult>();
  private readonly counts: JobCounts = {
    attempted: 0,
    succeeded: 0,
    failed: 0,
    skippedByRobots: 0,
    discovered: 0,
  };
  private readonly inFlightByDepth: number[] = [];
  private readonly completion: Promise<JobResult>;
  private settle: (result: JobResult) => void = () => undefined;
  private waiters: Array<() => void> = [];
  private readonly pageListeners = new Set<(page: PageResult | null) => void>();
  private jobTimer: NodeJS.Timeout | null = null;

  private state: JobStatus = 'pending';
  private active = 0;
  private dispatched = 0;
  private cancelReason: string | undefined;
  private failure: JobInternalError | undefined;
  private persistError: string | undefined;
  private readonly createdAt = new Date().toISOString();
  private startedAt: string | undefined;
  private completedAt: string | undefined;

  constructor(
    readonly id: string,
    request: JobRequest,
    private readonly plan: CrawlPlan,
    private readonly deps: JobCoordinatorDeps,
  ) {
    this.request = deepFreeze(structuredClone(request));
    this.frontier = new Frontier(plan.frontier);
    this.completion = new Promise((resolve) => {
      this.settle = resolve;
    });
  }

  get mode() {
    return this.request.mode;
  }

  isTerminal(): boolean {
    return TERMINAL_STATUSES.includes(this.state);
  }

  start(): void {
    if (this.state !== 'pending') return;

    this.state = 'running';
    this.startedAt = new Date().toISOString();
    for (const seed of this.plan.seeds) {
      this.frontier.push(seed, 0, null);
    }

    if (this.plan.jobTimeoutMs > 0) {
      this.jobTimer = setTimeout(() => this.cancel('timeout'), this.plan.jobTimeoutMs);
      this.jobTimer.unref();
    }

    const poolSize = Math.max(1, Math.min(this.plan.concurrency, this.plan.maxPages));
    this.logger.log(
      `Job ${this.id} (${this.plan.mode}) started: ${this.plan.seeds.length} seed(s), ${poolSize} worker(s)`,
    );

    this.run(poolSize).catch((error) => {
      this.logger.error(`Job ${this.id} runner crashed: ${errorMessage(error)}`);
      this.fail(error);
      if (this.jobTimer) clearTimeout(this.jobTimer);
      this.state = 'failed';
      this.completedAt = new Date().toISOString();
      this.settleWith(this.status());
    });
  }

  /** Point-in-time copy of the job, safe to hand out while workers run. */
  status(): JobResult {
    const pages = [...this.pages.values()].sort(
      (a, b) => a.depth - b.depth || a.sequence - b.sequence,
    );

    return structuredClone({
      id: this.id,
      mode: this.request.mode,
      request: this.request,
      status: this.state,
      pages,
      counts: { ...this.counts, discovered: this.frontier.seenCount() },
      error: this.failure?.message,
      cancelReason: this.cancelReason,
      persistError: this.persistError,
      createdAt: this.createdAt,
      startedAt: this.startedAt,
      completedAt: this.completedAt,
    });
  }

  summary(): JobSummary {
    return {
      id: this.id,
      mode: this.request.mode,
      status: this.state,
      pageCount: this.pages.size,
      counts: { ...this.counts, discovered: this.frontier.seenCount() },
      error: this.failure?.message,
      cancelReason: this.cancelReason,
      persistError: this.persistError,
      createdAt: this.createdAt,
      startedAt: this.startedAt,
      completedAt: this.completedAt,
    };
  }

  /**
   * Stops further pops. Fetches already in flight finish and are recorded.
   * Returns false when the job had already finished.
   */
  cancel(reason = 'cancelled by request'): boolean {
    if (this.isTerminal() || this.cancelReason !== undefined) return false;

    this.cancelReason = reason;
    this.logger.log(`Job ${this.id} cancelling: ${reason}`);

    if (this.state === 'pending') {
      this.state = 'cancelled';
      this.completedAt = new Date().toISOString();
      this.settleWith(this.status());
    }
    this.wake();
    return true;
  }

  awaitCompletion(timeoutMs?: number): Promise<JobResult> {
    if (timeoutMs === undefined || this.isTerminal()) return this.completion;

    return new Promise((resolve, reject) => {
      const timer = setTimeout(
        () => reject(new JobWaitTimeoutError(this.id, timeoutMs)),
        timeoutMs,
      );
      this.completion.then(
        (result) => {
          clearTimeout(timer);
          resolve(result);
        },
        (error) => {
          clearTimeout(timer);
          reject(error);
        },
      );
    });
  }

  /**
   * Yields the pages recorded so far, then each page as it is recorded,
   * and returns once the job has settled.
   */
  async *streamPages(): AsyncGenerator<PageResult> {
    const queue: Array<PageResult | null> = this.status().pages;
    if (this.isTerminal()) queue.push(null);

    let notify: () => void = () => undefined;
    const listener = (page: PageResult | null) => {
      queue.push(page);
      notify();
    };
    this.pageListeners.add(listener);

    try {
      for (;;) {
        const next = queue.shift();
        if (next === null) return;
        if (next) {
          yield next;
          continue;
        }
        await new Promise<void>((resolve) => {
          notify = resolve;
        });
      }
    } finally {
      this.pageListeners.delete(listener);
    }
  }

  private async run(poolSize: number): Promise<void> {
    const workers = Array.from({ length: poolSize }, () => this.worker());
    await Promise.all(workers);
    await this.finish();
  }

  private async worker(): Promise<void> {
    for (;;) {
      const entry = await this.next();
      if (!entry) return;

      this.active++;
      this.inFlightByDepth[entry.depth] = (this.inFlightByDepth[entry.depth] ?? 0) + 1;
      try {
        await this.process(entry);
      } catch (error) {
        this.fail(error);
      } finally {
        this.active--;
        this.inFlightByDepth[entry.depth]--;
        this.wake();
      }
    }
  }

  private async next(): Promise<FrontierEntry | undefined> {
    for (;;) {
      if (this.failure || this.cancelReason !== undefined) return undefined;

      if (this.dispatched >= this.plan.maxPages) {
        const dropped = this.frontier.clear();
        if (dropped > 0) {
          this.logger.log(
            `Job ${this.id} reached max_pages (${this.plan.maxPages}); discarded ${dropped} queued URL(s)`,
          );
        }
        return undefined;
      }

      const depth = this.frontier.peekDepth();
      if (depth === undefined) {
        if (this.active === 0) return undefined;
      } else if (this.canPopAt(depth)) {
        const entry = this.frontier.pop();
        if (entry) {
          this.dispatched++;
          return entry;
        }
      }

      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  // A page at depth d - 2 or shallower can still discover entries at depth d - 1.
  private canPopAt(depth: number): boolean {
    for (let d = 0; d < depth - 1; d++) {
      if ((this.inFlightByDepth[d] ?? 0) > 0) return false;
    }
    return true;
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }

  private async process(entry: FrontierEntry): Promise<void> {
    const outcome = await this.deps.fetcher.fetch(entry, this.plan.fetch);

    if (outcome.status === 'ok' && outcome.links) {
      for (const link of outcome.links) {
        this.frontier.push(link, entry.depth + 1, entry.url);
      }
    }

    const page: PageResult = {
      url: entry.url,
      depth: entry.depth,
      parent: entry.parent,
      sequence: entry.sequence,
      status: outcome.status,
      statusCode: outcome.statusCode,
      error: outcome.error,
      fetchedAt: outcome.fetchedAt,
      elapsedMs: outcome.elapsedMs,
      attempts: outcome.attempts,
    };

    if (outcome.status === 'ok') {
      try {
        Object.assign(page, await this.extract(outcome));
      } catch (error) {
        if (error instanceof CollaboratorUnavailableError) throw error;
        const extractionError =
          error instanceof CrawlError
            ? error
            : new ExtractionError(errorMessage(error), { cause: error });
        page.error = extractionError.message;
        this.logger.warn(
          `Job ${this.id}: extraction failed for ${entry.url}: ${extractionError.message}`,
        );
      }
    }

    this.counts.attempted++;
    if (outcome.status === 'blocked_by_robots') {
      this.counts.skippedByRobots++;
    } else if (outcome.status === 'ok' && page.error === undefined) {
      this.counts.succeeded++;
    } else {
      this.counts.failed++;
      this.logger.warn(`Job ${this.id}: ${entry.url} ${outcome.status}: ${page.error}`);
    }
    this.pages.set(entry.url, page);
    for (const listener of this.pageListeners) listener(structuredClone(page));
    this.logger.debug(
      `Job ${this.id}: ${entry.url} (depth ${entry.depth}) ${outcome.status} in ${outcome.elapsedMs}ms`,
    );
  }

  private async extract(outcome: FetchOutcome): Promise<PagePayload> {
    const { extractor } = this.deps;
    const html = outcome.html ?? '';
    const baseUrl = outcome.finalUrl ?? outcome.url;
    const request = this.request;

    switch (request.mode) {
      case 'scrape':
      case 'crawl': {
        const payload: PagePayload = {
          content: extractor.convert(html, request.format, {
            includeLinks: request.includeLinks,
            includeImages: request.includeImages,
          }),
          metadata: extractor.extractMetadata(html, baseUrl),
        };
        if (request.includeLinks) payload.links = extractor.extractLinks(html, baseUrl);
        if (request.includeImages) payload.images = extractor.extractImages(html, baseUrl);
        if (request.selectors && request.selectors.length > 0) {
          payload.fields = extractor.extractSelectors(html, request.selectors);
        }
        return payload;
      }

      case 'map': {
        const payload: PagePayload = {
          metadata: extractor.extractMetadata(html, baseUrl),
          linksCount: outcome.links?.length ?? 0,
        };
        if (request.includeContent) {
          payload.content = extractor.convert(html, request.format);
        }
        return payload;
      }

      case 'search': {
        const { matches, totalPassages } = extractor.rank(html, request.query);
        return { matches: matches.slice(0, request.topK), totalPassages };
      }

      case 'agent': {
        const content =
          extractor.convert(html, 'markdown') || extractor.convert(html, 'text');
        if (!content) {
          throw new ExtractionError('No content extracted from URL');
        }
        const extracted = await extractor.instruct(
          content,
          request.instruction,
          request.model,
          baseUrl,
        );
        return { content, extracted };
      }
    }
  }

  private fail(error: unknown): void {
    if (this.failure) return;

    this.failure =
      error instanceof JobInternalError
        ? error
        : new JobInternalError(errorMessage(error), { cause: error });
    this.logger.error(
      `Job ${this.id} failed: ${this.failure.message}`,
      error instanceof Error ? error.stack : undefined,
    );
    this.wake();
  }

  private async finish(): Promise<void> {
    if (this.jobTimer) clearTimeout(this.jobTimer);

    this.state = this.failure
      ? 'failed'
      : this.cancelReason !== undefined
        ? 'cancelled'
        : 'completed';
    this.completedAt = new Date().toISOString();

    try {
      await this.deps.store.save(this.status());
    } catch (error) {
      this.persistError = errorMessage(error);
      this.logger.error(`Job ${this.id}: saving result failed: ${this.persistError}`);
    }

    this.logger.log(
      `Job ${this.id} ${this.state}: ${this.counts.succeeded} ok, ${this.counts.failed} failed, ${this.counts.skippedByRobots} blocked`,
    );
    this.settleWith(this.status());
  }

  private settleWith(result: JobResult): void {
    this.settle(result);
    for (const listener of this.pageListeners) listener(null);
    this.pageListeners.clear();
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const entry of Object.values(value)) deepFreeze(entry);
    Object.freeze(value);
  }
  return value;
}
