import { Injectable } from '@nestjs/common';
import { WorkerRunnerPort } from '../application/ports/output/worker-runner.port';
import { failureResult, processFile } from '../processing/file-processor';
import { FileTask } from '../shared/interfaces/file-task.interface';
import {
  ProcessingErrorCode,
  ProcessingResult,
} from '../shared/interfaces/processing-result.interface';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';

export type FileProcessorFn = (task: FileTask) => Promise<ProcessingResult>;

/**
 * Inline Worker Runner
 *
 * Runs the file pipeline as an async task on the calling thread. Isolation
 * is the catch at this boundary: a throwing pipeline becomes a
 * WORKER_CRASHED result for its own task. An abort settles the promise
 * immediately; the underlying read cannot be interrupted and its late
 * result is dropped.
 */
@Injectable()
export class InlineWorkerRunner implements WorkerRunnerPort {
  readonly strategy = 'inline' as const;

  private readonly logger: PinoLoggerService;

  constructor(
    logger: PinoLoggerService,
    private readonly processor: FileProcessorFn = processFile,
  ) {
    this.logger = logger.child({ component: InlineWorkerRunner.name });
  }

  run(task: FileTask, signal?: AbortSignal): Promise<ProcessingResult> {
    if (signal?.aborted) {
      return Promise.resolve(
        failureResult(task, ProcessingErrorCode.UNKNOWN, 'Worker aborted before start'),
      );
    }

    return new Promise<ProcessingResult>((resolve) => {
      const onAbort = (): void => {
        resolve(failureResult(task, ProcessingErrorCode.UNKNOWN, 'Worker aborted'));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      this.execute(task)
        .then(resolve)
        .finally(() => signal?.removeEventListener('abort', onAbort))
        .catch((error: unknown) => {
          this.logger.error({ taskId: task.taskId, error }, 'Inline worker cleanup failed');
        });
    });
  }

  async shutdown(): Promise<void> {
    // nothing outlives the awaited promises
  }

  private async execute(task: FileTask): Promise<ProcessingResult> {
    try {
      return await this.processor(task);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ taskId: task.taskId, error: message }, 'Inline worker crashed');
      return failureResult(task, ProcessingErrorCode.WORKER_CRASHED, `Worker crashed: ${message}`);
    }
  }
}
