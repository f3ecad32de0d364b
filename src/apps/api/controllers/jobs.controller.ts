import {
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { JobRegistryService } from '@/shared/crawl/services/job-registry.service';
import { ResultsQueryDto } from '../dto/job-request.dto';
import { ApiKeyGuard } from '../guards/api-key.guard';
import { JobPresenter } from '../presenters/job.presenter';

@Controller('jobs')
@UseGuards(ApiKeyGuard)
export class JobsController {
  constructor(
    private readonly registry: JobRegistryService,
    private readonly presenter: JobPresenter,
  ) {}

  @Get()
  list() {
    const jobs = this.registry.list().map((job) => this.presenter.summary(job));
    return { success: true, total: jobs.length, jobs };
  }

  @Get(':id')
  async status(@Param('id') id: string) {
    return this.presenter.present(await this.registry.status(id));
  }

  @Get(':id/results')
  async results(@Param('id') id: string, @Query() query: ResultsQueryDto) {
    const slice = await this.registry.results(id, query.limit, query.offset);
    return this.presenter.slice(id, slice, query.limit, query.offset);
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  cancel(@Param('id') id: string) {
    return this.presenter.present(this.registry.cancel(id));
  }

  @Delete(':id')
  async purge(@Param('id') id: string) {
    await this.registry.purge(id);
    return { success: true, job_id: id, deleted: true };
  }
}
