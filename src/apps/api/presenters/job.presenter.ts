import { Inject, Injectable } from '@nestjs/common';
import { CRAWL_SETTINGS, CrawlSettings } from '@/shared/config/crawl-settings';
import type {
  JobCounts,
  JobResult,
  JobSummary,
  PageResult,
} from '@/shared/crawl/interfaces/job-result.interface';
import type { PageSlice } from '@/shared/store/interfaces/job-store.interface';

export type JobOutcome = 'complete' | 'partial' | 'failed' | 'empty';

type Payload = Record<string, unknown>;

/**
 * How a finished (or running) job reads to a caller, judged from its counts.
 * A completed job whose every page failed is 'failed' while still `success`.
 */
export function outcomeOf(result: Pick<JobResult, 'status' | 'counts'>): JobOutcome {
  const { attempted, succeeded } = result.counts;
  if (result.status === 'failed') return 'failed';
  if (attempted === 0) return 'empty';
  if (succeeded === attempted) return 'complete';
  if (succeeded === 0) return 'failed';
  return 'partial';
}

function presentCounts(counts: JobCounts) {
  return {
    pages_attempted: counts.attempted,
    pages_succeeded: counts.succeeded,
    pages_failed: counts.failed,
    pages_skipped_by_robots: counts.skippedByRobots,
    pages_discovered: counts.discovered,
  };
}

function presentJobFields(job: JobResult | JobSummary) {
  return {
    success: job.status !== 'failed',
    job_id: job.id,
    mode: job.mode,
    status: job.status,
    outcome: outcomeOf(job),
    counts: presentCounts(job.counts),
    error: job.error,
    cancel_reason: job.cancelReason,
    persist_error: job.persistError,
    created_at: job.createdAt,
    started_at: job.startedAt,
    completed_at: job.completedAt,
  };
}

@Injectable()
export class JobPresenter {
  constructor(@Inject(CRAWL_SETTINGS) private readonly settings: CrawlSettings) {}

  /** Full job envelope with the mode-specific payload on top. */
  present(result: JobResult): Payload {
    const envelope: Payload = presentJobFields(result);
    const request = result.request;
    const first = result.pages[0];

    switch (request.mode) {
      case 'scrape':
        return {
          ...envelope,
          url: request.url,
          format: request.format,
          ...this.presentSinglePage(first),
          content: first?.content,
          metadata: first?.metadata,
          links: first?.links,
          images: first?.images,
          fields: first?.fields,
        };

      case 'search':
        return {
          ...envelope,
          url: request.url,
          query: request.query,
          ...this.presentSinglePage(first),
          results: first?.matches ?? [],
          total_passages: first?.totalPassages ?? 0,
        };

      case 'agent':
        return {
          ...envelope,
          url: request.url,
          instruction: request.instruction,
          model: request.model ?? this.settings.defaultModel,
          ...this.presentSinglePage(first),
          extracted: first?.extracted ?? null,
          content_length: first?.content?.length ?? 0,
        };

      case 'map':
        return {
          ...envelope,
          url: request.url,
          urls: result.pages
            .filter((page) => page.status === 'ok')
            .map((page) => page.url),
          results: result.pages.map((page) => this.presentPage(page)),
        };

      case 'crawl':
        return {
          ...envelope,
          urls: request.urls,
          results: result.pages.map((page) => this.presentPage(page)),
        };
    }
  }

  summary(job: JobSummary): Payload {
    return { ...presentJobFields(job), page_count: job.pageCount };
  }

  slice(jobId: string, slice: PageSlice, limit: number, offset: number): Payload {
    return {
      success: true,
      job_id: jobId,
      total: slice.total,
      limit,
      offset,
      results: slice.pages.map((page) => this.presentPage(page)),
    };
  }

  presentPage(page: PageResult): Payload {
    return {
      url: page.url,
      depth: page.depth,
      parent: page.parent,
      status: page.status,
      status_code: page.statusCode,
      title: page.metadata?.title,
      content: page.content,
      metadata: page.metadata,
      links: page.links,
      links_count: page.linksCount,
      images: page.images,
      fields: page.fields,
      results: page.matches,
      extracted: page.extracted,
      error: page.error,
      fetched_at: page.fetchedAt,
      elapsed_ms: page.elapsedMs,
      attempts: page.attempts,
    };
  }

  private presentSinglePage(page: PageResult | undefined): {
    page_status?: string;
    status_code?: number;
    page_error?: string;
  } {
    if (!page) return {};
    return {
      page_status: page.status,
      status_code: page.statusCode,
      page_error: page.error,
    };
  }
}
