import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CRAWL_SETTINGS, crawlSettingsFactory } from '../config/crawl-settings';
import { ExtractionModule } from '../extraction/extraction.module';
import { RenderingModule } from '../rendering/rendering.module';
import { StoreModule } from '../store/store.module';
import { FetcherService } from './services/fetcher.service';
import { HostThrottleService } from './services/host-throttle.service';
import { JobRegistryService } from './services/job-registry.service';
import { RobotsGateService } from './services/robots-gate.service';

@Module({
  imports: [RenderingModule, ExtractionModule, StoreModule],
  providers: [
    {
      provide: CRAWL_SETTINGS,
      inject: [ConfigService],
      useFactory: crawlSettingsFactory,
    },
    RobotsGateService,
    HostThrottleService,
    FetcherService,
    JobRegistryService,
  ],
  exports: [CRAWL_SETTINGS, JobRegistryService, ExtractionModule],
})
export class CrawlModule {}
