import { Injectable, Logger } from '@nestjs/common';
import { BatchResult } from '../../shared/interfaces/batch-result.interface';
import { CoordinatorService } from '../../worker-pool/coordinator.service';
import { RunParallelCommand, RunParallelPort } from '../ports/input/run-parallel.port';

/**
 * Run Parallel Use Case
 * One worker per file through the coordinator
 */
@Injectable()
export class RunParallelUseCase implements RunParallelPort {
  private readonly logger = new Logger(RunParallelUseCase.name);

  constructor(private readonly coordinator: CoordinatorService) {}

  async execute(command: RunParallelCommand): Promise<BatchResult> {
    const batchResult = await this.coordinator.run(command.tasks, {
      timeoutMs: command.timeoutMs,
      batchId: command.batchId,
      onResult: command.onResult,
    });

    this.logger.log(
      `Batch ${batchResult.batchId} finished in parallel (${this.coordinator.strategy} workers) ` +
        `in ${batchResult.totalTimeMs}ms`,
    );
    return batchResult;
  }
}
