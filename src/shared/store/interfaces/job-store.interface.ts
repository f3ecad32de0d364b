import type {
  JobResult,
  PageResult,
} from '@/shared/crawl/interfaces/job-result.interface';

export const JOB_STORE = Symbol('JOB_STORE');

export interface PageSlice {
  total: number;
  pages: PageResult[];
}

/** Persistence of finished jobs. Saving the same id again replaces the record. */
export interface JobStore {
  save(result: JobResult): Promise<void>;
  load(jobId: string): Promise<JobResult | null>;
  listPages(jobId: string, limit: number, offset: number): Promise<PageSlice | null>;
  delete(jobId: string): Promise<boolean>;
}
