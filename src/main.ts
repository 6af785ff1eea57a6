import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ConfigError, describeError } from './common/errors/engagement.errors';
import { OrchestratorService } from './engagement/orchestrator/orchestrator.service';

const logger = new Logger('Main');

/**
 * `main [accountId]`: runs every active account, or just the one named,
 * then exits. Exit code 1 when any account failed.
 */
async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, { abortOnError: false });
  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.warn(`${signal} received, stopping at the next safe point`);
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    const orchestrator = app.get(OrchestratorService);
    const accountId = process.argv[2];
    if (accountId) {
      const result = await orchestrator.runOne(accountId, controller.signal);
      process.exitCode = result.status === 'failed' ? 1 : 0;
    } else {
      const report = await orchestrator.runAll(undefined, undefined, controller.signal);
      process.exitCode = report.statusCounts.failed > 0 ? 1 : 0;
    }
  } finally {
    process.removeListener('SIGINT', stop);
    process.removeListener('SIGTERM', stop);
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error(error.message);
  } else {
    logger.error(`Run aborted: ${describeError(error)}`, error instanceof Error ? error.stack : undefined);
  }
  process.exitCode = 1;
});
