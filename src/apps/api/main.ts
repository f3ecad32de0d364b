import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { setupGracefulShutdown } from '@/shared/utils/graceful-shutdown';
import { ApiAppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(
    ApiAppModule,
    new FastifyAdapter({ trustProxy: true }),
  );

  configureApp(app);
  setupGracefulShutdown(app);

  const port = process.env.PORT ?? 3000;
  await app.listen(port, '0.0.0.0');
  new Logger('Bootstrap').log(`API listening on port ${port}`);
}
void bootstrap();
