import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';
import { ProcessBatchUseCase } from './application/use-cases/process-batch.use-case';
import { CoordinatorService } from './worker-pool/coordinator.service';
import { ExecutionStatus } from './shared/interfaces/batch-result.interface';
import { parseCommandLine } from './cli/command-line';

/**
 * Bootstrap a standalone application context, run one batch and exit.
 */
async function bootstrap() {
  const command = parseCommandLine(process.argv.slice(2));

  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  const configService = app.get(ConfigService<AppConfig>);
  const logger = app.get(PinoLoggerService);

  app.useLogger(logger);
  logger.setContext('Bootstrap');
  app.enableShutdownHooks();

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  logger.info(
    {
      nodeEnv: configService.get('nodeEnv', { infer: true }),
      worker: configService.get('worker', { infer: true }),
      mode: command.mode,
      files: command.paths.length,
    },
    'File metrics run starting',
  );

  try {
    const execution = await app.get(ProcessBatchUseCase).execute({
      mode: command.mode,
      paths: command.paths,
    });

    logger.info(
      { summary: execution.summary, stats: app.get(CoordinatorService).getStats() },
      'File metrics run finished',
    );
    process.stdout.write(`${JSON.stringify(execution, null, 2)}\n`);
    process.exitCode = execution.summary.status === ExecutionStatus.ERROR ? 1 : 0;
  } finally {
    await app.close();
  }
}

bootstrap().catch((error) => {
  console.error('File metrics run failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
