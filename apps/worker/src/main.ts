import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, type LogLevel } from '@nestjs/common';
import { RunService } from './services/run.service';

/**
 * Run the monitor once and exit; scheduling is left to cron or CI
 */
async function bootstrap() {
  const logger = new Logger('WorkerBootstrap');
  const levels: LogLevel[] =
    process.env.LOG_LEVEL === 'debug'
      ? ['log', 'error', 'warn', 'debug', 'verbose']
      : ['log', 'error', 'warn'];

  try {
    // Loaded here so environment validation errors are logged below
    const { WorkerModule } = await import('./worker.module');

    // Create NestJS application context (no HTTP server)
    const app = await NestFactory.createApplicationContext(WorkerModule, { logger: levels });

    try {
      const report = await app.get(RunService).run();
      logger.log(`Run complete (login: ${report.auth}, products: ${report.outcomes.length})`);
    } finally {
      await app.close();
    }
  } catch (error) {
    logger.error('Run failed', error instanceof Error ? error.stack : String(error));
    process.exitCode = 1;
  }
}

void bootstrap();
