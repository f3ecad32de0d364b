import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { v4 as uuidv4 } from 'uuid';
import { CRAWL_SETTINGS, CrawlSettings } from '@/shared/config/crawl-settings';
import { JobNotFoundError, errorMessage } from '@/shared/crawl/errors/crawl.errors';
import type { JobRequest } from '@/shared/crawl/interfaces/job-request.interface';
import type {
  JobResult,
  JobSummary,
} from '@/shared/crawl/interfaces/job-result.interface';
import { JobCoordinator } from '@/shared/crawl/job-coordinator';
import { buildCrawlPlan } from '@/shared/crawl/job-plan';
import { ExtractorService } from '@/shared/extraction/extractor.service';
import {
  JOB_STORE,
  JobStore,
  PageSlice,
} from '@/shared/store/interfaces/job-store.interface';
import { FetcherService } from './fetcher.service';

const SWEEP_INTERVAL_NAME = 'job-retention-sweep';
const SHUTDOWN_GRACE_MS = 5000;

/**
 * Process-wide map of job id to coordinator. Terminal jobs stay until purged,
 * either explicitly or by the retention sweep.
 */
@Injectable()
export class JobRegistryService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(JobRegistryService.name);
  private readonly jobs = new Map<string, JobCoordinator>();

  constructor(
    @Inject(FetcherService)
    private readonly fetcher: Pick<FetcherService, 'fetch'>,
    private readonly extractor: ExtractorService,
    @Inject(JOB_STORE) private readonly store: JobStore,
    @Inject(CRAWL_SETTINGS) private readonly settings: CrawlSettings,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  onModuleInit() {
    if (this.settings.jobRetentionMs <= 0) return;

    const interval = setInterval(
      () => this.purgeExpired(),
      this.settings.jobSweepIntervalMs,
    );
    interval.unref();
    this.schedulerRegistry.addInterval(SWEEP_INTERVAL_NAME, interval);
  }

  async onModuleDestroy() {
    if (this.schedulerRegistry.doesExist('interval', SWEEP_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(SWEEP_INTERVAL_NAME);
    }

    const running = [...this.jobs.values()].filter((job) => !job.isTerminal());
    if (running.length === 0) return;

    this.logger.log(`Cancelling ${running.length} running job(s) on shutdown`);
    for (const job of running) job.cancel('shutdown');

    const settled = await Promise.allSettled(
      running.map((job) => job.awaitCompletion(SHUTDOWN_GRACE_MS)),
    );
    const stuck = settled.filter((result) => result.status === 'rejected').length;
    if (stuck > 0) {
      this.logger.warn(`${stuck} job(s) still running after ${SHUTDOWN_GRACE_MS}ms`);
    }
  }

  /** Validates, registers and starts a job. Throws JobConfigError before anything starts. */
  submit(request: JobRequest): JobCoordinator {
    const plan = buildCrawlPlan(request, this.settings);
    const job = new JobCoordinator(uuidv4(), request, plan, {
      fetcher: this.fetcher,
      extractor: this.extractor,
      store: this.store,
    });

    this.jobs.set(job.id, job);
    job.start();
    return job;
  }

  get(jobId: string): JobCoordinator {
    const job = this.jobs.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }

  /** Live snapshot, or the stored record of a job no longer in memory. */
  async status(jobId: string): Promise<JobResult> {
    const job = this.jobs.get(jobId);
    if (job) return job.status();

    const stored = await this.store.load(jobId);
    if (!stored) throw new JobNotFoundError(jobId);
    return stored;
  }

  async results(jobId: string, limit: number, offset: number): Promise<PageSlice> {
    const job = this.jobs.get(jobId);
    if (job) {
      const { pages } = job.status();
      return { total: pages.length, pages: pages.slice(offset, offset + limit) };
    }

    const slice = await this.store.listPages(jobId, limit, offset);
    if (!slice) throw new JobNotFoundError(jobId);
    return slice;
  }

  cancel(jobId: string): JobResult {
    const job = this.get(jobId);
    job.cancel();
    return job.status();
  }

  /** Drops a job from memory and from the store. Running jobs are cancelled first. */
  async purge(jobId: string): Promise<void> {
    const job = this.jobs.get(jobId);
    if (job) {
      this.jobs.delete(jobId);
      job.cancel('purged');
      if (!job.isTerminal()) {
        // The final save has to land before the store delete.
        await job.awaitCompletion(SHUTDOWN_GRACE_MS).catch((error) => {
          this.logger.warn(`Purged job ${jobId} still running: ${errorMessage(error)}`);
        });
      }
    }

    let deleted = false;
    try {
      deleted = await this.store.delete(jobId);
    } catch (error) {
      this.logger.error(`Deleting stored job ${jobId} failed: ${errorMessage(error)}`);
      if (!job) throw error;
    }
    if (!job && !deleted) throw new JobNotFoundError(jobId);
  }

  list(): JobSummary[] {
    return [...this.jobs.values()].map((job) => job.summary());
  }

  /** Removes terminal jobs completed more than JOB_RETENTION_MS ago. */
  purgeExpired(now = Date.now()): number {
    const cutoff = now - this.settings.jobRetentionMs;
    let purged = 0;

    for (const [jobId, job] of this.jobs) {
      if (!job.isTerminal()) continue;
      const { completedAt } = job.summary();
      if (completedAt && Date.parse(completedAt) < cutoff) {
        this.jobs.delete(jobId);
        purged++;
      }
    }

    if (purged > 0) {
      this.logger.log(`Retention sweep purged ${purged} job(s)`);
    }
    return purged;
  }
}
