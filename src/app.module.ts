import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { InfrastructureModule } from './infrastructure/infrastructure.module';
import { WorkerPoolModule } from './worker-pool/worker-pool.module';
import { ApplicationModule } from './application/application.module';

/**
 * Application Module
 * Standalone application context (no HTTP server): the entry point resolves
 * ProcessBatchUseCase and runs one batch.
 */
@Module({
  imports: [ConfigModule, SharedModule, InfrastructureModule, WorkerPoolModule, ApplicationModule],
})
export class AppModule {}
