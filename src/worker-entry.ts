import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { describeError } from './common/errors/engagement.errors';
import { EngagementScheduler } from './worker/schedulers/engagement.scheduler';
import { WorkerAppModule } from './worker-app.module';

const logger = new Logger('Worker');

/** `worker-entry [--now]`: consumes engagement runs; `--now` also enqueues one at start. */
async function bootstrap(): Promise<void> {
  // No HTTP server: cron and queue only
  const app = await NestFactory.createApplicationContext(WorkerAppModule, { abortOnError: false });
  app.enableShutdownHooks();

  if (process.argv.includes('--now')) {
    await app.get(EngagementScheduler).enqueueRun();
  }
  logger.log('Engagement worker is listening for jobs');
}

bootstrap().catch((error: unknown) => {
  logger.error(`Worker failed to start: ${describeError(error)}`);
  process.exitCode = 1;
});
