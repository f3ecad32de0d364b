import { Injectable } from '@nestjs/common';
import type { JobResult } from '@/shared/crawl/interfaces/job-result.interface';
import type { JobStore, PageSlice } from '../interfaces/job-store.interface';

@Injectable()
export class MemoryJobStore implements JobStore {
  private readonly records = new Map<string, JobResult>();

  async save(result: JobResult): Promise<void> {
    this.records.set(result.id, structuredClone(result));
  }

  async load(jobId: string): Promise<JobResult | null> {
    const record = this.records.get(jobId);
    return record ? structuredClone(record) : null;
  }

  async listPages(
    jobId: string,
    limit: number,
    offset: number,
  ): Promise<PageSlice | null> {
    const record = this.records.get(jobId);
    if (!record) return null;
    return {
      total: record.pages.length,
      pages: structuredClone(record.pages.slice(offset, offset + limit)),
    };
  }

  async delete(jobId: string): Promise<boolean> {
    return this.records.delete(jobId);
  }
}
