import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigModule } from '../config/config.module';
import { AppConfig } from '../config/configuration';
import { WORKER_RUNNER_PORT } from '../application/ports/tokens';
import { WorkerRunnerPort } from '../application/ports/output/worker-runner.port';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import { CoordinatorService } from './coordinator.service';
import { InlineWorkerRunner } from './inline-worker-runner.service';
import { ThreadWorkerRunner } from './thread-worker-runner.service';

export function createWorkerRunner(
  configService: ConfigService<AppConfig>,
  logger: PinoLoggerService,
): WorkerRunnerPort {
  const { strategy } = configService.getOrThrow('worker', { infer: true });
  return strategy === 'inline' ? new InlineWorkerRunner(logger) : new ThreadWorkerRunner(logger);
}

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: WORKER_RUNNER_PORT,
      useFactory: createWorkerRunner,
      inject: [ConfigService, PinoLoggerService],
    },
    CoordinatorService,
  ],
  exports: [WORKER_RUNNER_PORT, CoordinatorService],
})
export class WorkerPoolModule {}
