import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import type { QueryResult, QueryResultRow } from 'pg';
import type {
  CrawlMode,
  JobRequest,
} from '@/shared/crawl/interfaces/job-request.interface';
import type {
  JobCounts,
  JobResult,
  JobStatus,
  PageResult,
} from '@/shared/crawl/interfaces/job-result.interface';
import type { JobStore, PageSlice } from '../interfaces/job-store.interface';

/** The subset of a pg Pool the store uses. */
export interface Queryable {
  query<R extends QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>>;
  end(): Promise<void>;
}

interface CrawlJobRow {
  id: string;
  mode: CrawlMode;
  status: JobStatus;
  request: JobRequest;
  counts: JobCounts;
  pages: PageResult[];
  error: string | null;
  cancel_reason: string | null;
  created_at: Date;
  started_at: Date | null;
  completed_at: Date | null;
}

const CREATE_TABLE = `
  CREATE TABLE IF NOT EXISTS crawl_jobs (
    id            TEXT PRIMARY KEY,
    mode          TEXT NOT NULL,
    status        TEXT NOT NULL,
    request       JSONB NOT NULL,
    counts        JSONB NOT NULL,
    pages         JSONB NOT NULL,
    error         TEXT,
    cancel_reason TEXT,
    created_at    TIMESTAMPTZ NOT NULL,
    started_at    TIMESTAMPTZ,
    completed_at  TIMESTAMPTZ
  )`;

const UPSERT = `
  INSERT INTO crawl_jobs
    (id, mode, status, request, counts, pages, error, cancel_reason, created_at, started_at, completed_at)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
  ON CONFLICT (id) DO UPDATE SET
    status = EXCLUDED.status,
    counts = EXCLUDED.counts,
    pages = EXCLUDED.pages,
    error = EXCLUDED.error,
    cancel_reason = EXCLUDED.cancel_reason,
    started_at = EXCLUDED.started_at,
    completed_at = EXCLUDED.completed_at`;

@Injectable()
export class PostgresJobStore implements JobStore, OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(PostgresJobStore.name);

  constructor(private readonly pool: Queryable) {}

  async onModuleInit(): Promise<void> {
    await this.pool.query(CREATE_TABLE);
    this.logger.log('crawl_jobs table ready');
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
  }

  async save(result: JobResult): Promise<void> {
    await this.pool.query(UPSERT, [
      result.id,
      result.mode,
      result.status,
      JSON.stringify(result.request),
      JSON.stringify(result.counts),
      JSON.stringify(result.pages),
      result.error ?? null,
      result.cancelReason ?? null,
      result.createdAt,
      result.startedAt ?? null,
      result.completedAt ?? null,
    ]);
  }

  async load(jobId: string): Promise<JobResult | null> {
    const { rows } = await this.pool.query<CrawlJobRow>(
      'SELECT * FROM crawl_jobs WHERE id = $1',
      [jobId],
    );
    return rows.length > 0 ? toJobResult(rows[0]) : null;
  }

  async listPages(
    jobId: string,
    limit: number,
    offset: number,
  ): Promise<PageSlice | null> {
    const { rows } = await this.pool.query<{ total: number; pages: PageResult[] }>(
      `SELECT jsonb_array_length(pages) AS total,
              COALESCE(
                (SELECT jsonb_agg(page ORDER BY ordinality)
                   FROM jsonb_array_elements(pages) WITH ORDINALITY AS p(page, ordinality)
                  WHERE ordinality > $2 AND ordinality <= $2 + $3),
                '[]'::jsonb) AS pages
         FROM crawl_jobs WHERE id = $1`,
      [jobId, offset, limit],
    );
    if (rows.length === 0) return null;
    return { total: Number(rows[0].total), pages: rows[0].pages };
  }

  async delete(jobId: string): Promise<boolean> {
    const { rowCount } = await this.pool.query(
      'DELETE FROM crawl_jobs WHERE id = $1',
      [jobId],
    );
    return (rowCount ?? 0) > 0;
  }
}

function toJobResult(row: CrawlJobRow): JobResult {
  return {
    id: row.id,
    mode: row.mode,
    request: row.request,
    status: row.status,
    pages: row.pages,
    counts: row.counts,
    error: row.error ?? undefined,
    cancelReason: row.cancel_reason ?? undefined,
    createdAt: row.created_at.toISOString(),
    startedAt: row.started_at?.toISOString(),
    completedAt: row.completed_at?.toISOString(),
  };
}
