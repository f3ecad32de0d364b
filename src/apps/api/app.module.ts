import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { CacheModule } from '@nestjs/cache-manager';
import { ScheduleModule } from '@nestjs/schedule';
import { redisStore } from 'cache-manager-redis-yet';
import { loadEnv } from '@/shared/config/load-env';
import { validationSchema } from '@/shared/config/env.validation';
import { CrawlModule } from '@/shared/crawl/crawl.module';
import { CrawlController } from './controllers/crawl.controller';
import { HealthController } from './controllers/health.controller';
import { JobsController } from './controllers/jobs.controller';
import { MetadataController } from './controllers/metadata.controller';
import { JobPresenter } from './presenters/job.presenter';

loadEnv();

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validationSchema,
      ignoreEnvFile: true,
    }),
    // robots.txt cache: Redis when configured, in-process memory otherwise.
    CacheModule.registerAsync({
      isGlobal: true,
      inject: [ConfigService],
      useFactory: async (configService: ConfigService) => {
        const host = configService.get<string>('REDIS_HOST');
        if (!host) return {};
        return {
          store: await redisStore({
            socket: {
              host,
              port: Number(configService.get<number>('REDIS_PORT') ?? 6379),
            },
          }),
        };
      },
    }),
    ScheduleModule.forRoot(),
    CrawlModule,
  ],
  controllers: [CrawlController, JobsController, HealthController, MetadataController],
  providers: [JobPresenter],
})
export class ApiAppModule {}
