import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { WorkerPoolModule } from '../worker-pool/worker-pool.module';

// Use Cases
import {
  RunSequentialUseCase,
  RunParallelUseCase,
  RunBenchmarkUseCase,
  ProcessBatchUseCase,
} from './use-cases';

/**
 * Application Module
 * Contains all use cases and application services
 *
 * Use cases depend on port tokens; the adapters behind them come from
 * InfrastructureModule and WorkerPoolModule.
 */
@Module({
  imports: [InfrastructureModule, WorkerPoolModule],
  providers: [RunSequentialUseCase, RunParallelUseCase, RunBenchmarkUseCase, ProcessBatchUseCase],
  exports: [RunSequentialUseCase, RunParallelUseCase, RunBenchmarkUseCase, ProcessBatchUseCase],
})
export class ApplicationModule {}
