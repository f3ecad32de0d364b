import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool } from 'pg';
import { JOB_STORE, JobStore } from './interfaces/job-store.interface';
import { MemoryJobStore } from './stores/memory-job.store';
import { PostgresJobStore } from './stores/postgres-job.store';

@Module({
  providers: [
    {
      provide: JOB_STORE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): JobStore => {
        const driver = configService.get<string>('STORE_DRIVER') || 'memory';
        if (driver !== 'postgres') {
          return new MemoryJobStore();
        }

        const connectionString = configService.get<string>('DATABASE_URL');
        if (!connectionString) {
          throw new Error('DATABASE_URL is required when STORE_DRIVER=postgres');
        }
        new Logger('StoreModule').log('Persisting jobs to Postgres');
        return new PostgresJobStore(new Pool({ connectionString }));
      },
    },
  ],
  exports: [JOB_STORE],
})
export class StoreModule {}
