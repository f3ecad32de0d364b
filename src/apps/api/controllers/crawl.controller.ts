import {
  Body,
  Controller,
  DefaultValuePipe,
  HttpStatus,
  Inject,
  Logger,
  ParseBoolPipe,
  Post,
  Query,
  Res,
  UseGuards,
} from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import { Readable } from 'stream';
import { CRAWL_SETTINGS, CrawlSettings } from '@/shared/config/crawl-settings';
import { JobWaitTimeoutError } from '@/shared/crawl/errors/crawl.errors';
import type { JobRequest } from '@/shared/crawl/interfaces/job-request.interface';
import type { JobCoordinator } from '@/shared/crawl/job-coordinator';
import { JobRegistryService } from '@/shared/crawl/services/job-registry.service';
import {
  AgentJobDto,
  CrawlJobDto,
  MapJobDto,
  ScrapeJobDto,
  SearchJobDto,
} from '../dto/job-request.dto';
import { ApiKeyGuard } from '../guards/api-key.guard';
import {
  toAgentRequest,
  toCrawlRequest,
  toMapRequest,
  toScrapeRequest,
  toSearchRequest,
} from '../mappers/job-request.mapper';
import { JobPresenter } from '../presenters/job.presenter';

const asyncFlag = () => new DefaultValuePipe(false);

/**
 * One endpoint per crawl mode. By default the request waits for the job
 * (up to SYNC_WAIT_TIMEOUT_MS) and answers 200 with the result; with
 * `?async=true`, or when the wait runs out, it answers 202 with a snapshot
 * to poll under /jobs/:id.
 */
@Controller()
@UseGuards(ApiKeyGuard)
export class CrawlController {
  private readonly logger = new Logger(CrawlController.name);

  constructor(
    private readonly registry: JobRegistryService,
    private readonly presenter: JobPresenter,
    @Inject(CRAWL_SETTINGS) private readonly settings: CrawlSettings,
  ) {}

  @Post('scrape')
  scrape(
    @Body() dto: ScrapeJobDto,
    @Query('async', asyncFlag(), ParseBoolPipe) runAsync: boolean,
    @Res() reply: FastifyReply,
  ) {
    return this.submit(toScrapeRequest(dto), runAsync, reply);
  }

  @Post('search')
  search(
    @Body() dto: SearchJobDto,
    @Query('async', asyncFlag(), ParseBoolPipe) runAsync: boolean,
    @Res() reply: FastifyReply,
  ) {
    return this.submit(toSearchRequest(dto), runAsync, reply);
  }

  @Post('agent')
  agent(
    @Body() dto: AgentJobDto,
    @Query('async', asyncFlag(), ParseBoolPipe) runAsync: boolean,
    @Res() reply: FastifyReply,
  ) {
    return this.submit(toAgentRequest(dto), runAsync, reply);
  }

  @Post('map')
  map(
    @Body() dto: MapJobDto,
    @Query('async', asyncFlag(), ParseBoolPipe) runAsync: boolean,
    @Res() reply: FastifyReply,
  ) {
    return this.submit(toMapRequest(dto), runAsync, reply);
  }

  @Post('crawl')
  crawl(
    @Body() dto: CrawlJobDto,
    @Query('async', asyncFlag(), ParseBoolPipe) runAsync: boolean,
    @Res() reply: FastifyReply,
  ) {
    return this.submit(toCrawlRequest(dto), runAsync, reply);
  }

  /** One NDJSON line per page as it is recorded, then a final line with the job summary. */
  @Post('crawl/stream')
  crawlStream(@Body() dto: CrawlJobDto, @Res() reply: FastifyReply) {
    const job = this.registry.submit(toCrawlRequest(dto));
    this.logger.log(`Streaming crawl job ${job.id}`);

    return reply
      .status(HttpStatus.OK)
      .type('application/x-ndjson')
      .header('Cache-Control', 'no-cache')
      .send(Readable.from(this.ndjsonLines(job)));
  }

  private async *ndjsonLines(job: JobCoordinator): AsyncGenerator<string> {
    for await (const page of job.streamPages()) {
      yield `${JSON.stringify({ job_id: job.id, ...this.presenter.presentPage(page) })}\n`;
    }
    yield `${JSON.stringify({ done: true, ...this.presenter.summary(job.summary()) })}\n`;
  }

  private async submit(request: JobRequest, runAsync: boolean, reply: FastifyReply) {
    const job = this.registry.submit(request);
    this.logger.log(`Accepted ${request.mode} job ${job.id}${runAsync ? ' (async)' : ''}`);

    if (runAsync) {
      return reply.status(HttpStatus.ACCEPTED).send(this.presenter.present(job.status()));
    }

    try {
      const result = await job.awaitCompletion(this.settings.syncWaitTimeoutMs);
      return reply.status(HttpStatus.OK).send(this.presenter.present(result));
    } catch (error) {
      if (!(error instanceof JobWaitTimeoutError)) throw error;
      this.logger.log(`Job ${job.id} still running after sync wait; answering 202`);
      return reply.status(HttpStatus.ACCEPTED).send(this.presenter.present(job.status()));
    }
  }
}
