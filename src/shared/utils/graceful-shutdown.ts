import { INestApplicationContext, Logger } from '@nestjs/common';

export function setupGracefulShutdown(app: INestApplicationContext): void {
  const logger = new Logger('GracefulShutdown');
  let closing = false;

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      if (closing) return;
      closing = true;
      logger.log(`${signal} received: cancelling jobs and closing application...`);

      app.close().then(
        () => {
          logger.log('Application closed gracefully.');
          process.exit(0);
        },
        (err: unknown) => {
          logger.error(`Error during graceful shutdown: ${String(err)}`);
          process.exit(1);
        },
      );
    });
  }
}
