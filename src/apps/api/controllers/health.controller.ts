import { Controller, Get } from '@nestjs/common';
import { JobRegistryService } from '@/shared/crawl/services/job-registry.service';

@Controller('health')
export class HealthController {
  constructor(private readonly registry: JobRegistryService) {}

  @Get()
  getHealth() {
    const jobs = this.registry.list();

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'api',
      jobs: {
        total: jobs.length,
        running: jobs.filter((job) => job.status === 'running').length,
      },
    };
  }
}
