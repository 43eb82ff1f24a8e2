import { Inject, Injectable, Logger } from '@nestjs/common';
import { performance } from 'perf_hooks';
import { BatchRunEntity } from '../../domain/entities/batch-run.entity';
import { BatchEntry, BatchResult } from '../../shared/interfaces/batch-result.interface';
import { FileTask } from '../../shared/interfaces/file-task.interface';
import { ProcessingResult } from '../../shared/interfaces/processing-result.interface';
import { RunSequentialCommand, RunSequentialPort } from '../ports/input/run-sequential.port';
import { FileProcessorPort } from '../ports/output/file-processor.port';
import { FILE_PROCESSOR_PORT } from '../ports/tokens';

/**
 * One file at a time, in input order. No worker boundary here: the file
 * processor already turns every file problem into a result.
 */
export async function runSequential(
  tasks: readonly FileTask[],
  processor: FileProcessorPort,
  onResult?: (entry: BatchEntry) => void,
): Promise<ProcessingResult[]> {
  const results: ProcessingResult[] = [];
  for (const task of tasks) {
    const result = await processor.process(task);
    results.push(result);
    onResult?.({ task, result });
  }
  return results;
}

/**
 * Run Sequential Use Case
 * Baseline path: same pipeline as the workers, no concurrency
 */
@Injectable()
export class RunSequentialUseCase implements RunSequentialPort {
  private readonly logger = new Logger(RunSequentialUseCase.name);

  constructor(@Inject(FILE_PROCESSOR_PORT) private readonly processor: FileProcessorPort) {}

  async execute(command: RunSequentialCommand): Promise<BatchResult> {
    const { tasks } = command;
    let batch = BatchRunEntity.start(
      BatchRunEntity.create({ tasks, batchId: command.batchId }),
      performance.now(),
    );
    this.logger.debug(`Batch ${batch.batchId}: processing ${tasks.length} file(s) sequentially`);

    const results = await runSequential(tasks, this.processor, command.onResult);
    results.forEach((result, index) => {
      batch = BatchRunEntity.recordResult(batch, tasks[index].taskId, result);
    });

    batch = BatchRunEntity.complete(batch, performance.now());
    const batchResult = BatchRunEntity.toBatchResult(batch);

    this.logger.log(
      `Batch ${batchResult.batchId} finished sequentially in ${batchResult.totalTimeMs}ms ` +
        `(${batchResult.successCount} ok, ${batchResult.partialCount} partial, ${batchResult.errorCount} failed)`,
    );
    return batchResult;
  }
}
