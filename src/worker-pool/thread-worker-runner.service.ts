import { Inject, Injectable, OnModuleDestroy, Optional } from '@nestjs/common';
import { existsSync } from 'fs';
import * as path from 'path';
import { Worker } from 'worker_threads';
import { WorkerRunnerPort } from '../application/ports/output/worker-runner.port';
import { failureResult } from '../processing/file-processor';
import { FileTask } from '../shared/interfaces/file-task.interface';
import {
  ProcessingErrorCode,
  ProcessingResult,
} from '../shared/interfaces/processing-result.interface';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import {
  ProcessTaskPayload,
  WorkerInitData,
  WorkerMessageType,
  WorkerToMainMessage,
  createMessage,
  isWorkerToMainMessage,
} from './interfaces/worker-message.interface';

export const THREAD_WORKER_ENTRY = 'ThreadWorkerEntry';

/**
 * Script a worker thread starts from. `eval` entries are source text.
 */
export interface WorkerEntry {
  filename: string;
  eval: boolean;
}

const SHUTDOWN_GRACE_MS = 1000;

/**
 * Compiled builds ship `worker-thread.js` next to this file. When running
 * from TypeScript sources (tests, local runs), the thread loads the `.ts`
 * entry through tsx.
 */
export function resolveWorkerEntry(baseDir: string = __dirname): WorkerEntry {
  const compiled = path.join(baseDir, 'threads', 'worker-thread.js');
  if (existsSync(compiled)) {
    return { filename: compiled, eval: false };
  }

  const source = path.join(baseDir, 'threads', 'worker-thread.ts');
  return {
    filename: `require('tsx/cjs');\nrequire(${JSON.stringify(source)});`,
    eval: true,
  };
}

/**
 * Thread Worker Runner
 *
 * One Node.js worker thread per task. The thread is told which task it
 * owns, gets a single PROCESS_TASK and must answer with a message carrying
 * the same task id. Every outcome settles the returned promise once:
 *
 * - TASK_COMPLETED: the result, then SHUTDOWN is posted
 * - TASK_FAILED, `error` event, exit before replying: WORKER_CRASHED
 * - abort signal: the thread is terminated, UNKNOWN "Worker aborted"
 */
@Injectable()
export class ThreadWorkerRunner implements WorkerRunnerPort, OnModuleDestroy {
  readonly strategy = 'thread' as const;

  private readonly entry: WorkerEntry;
  private readonly liveWorkers = new Set<Worker>();
  private readonly logger: PinoLoggerService;

  constructor(
    logger: PinoLoggerService,
    @Optional() @Inject(THREAD_WORKER_ENTRY) entry?: WorkerEntry,
  ) {
    this.logger = logger.child({ component: ThreadWorkerRunner.name });
    this.entry = entry ?? resolveWorkerEntry();
  }

  async onModuleDestroy(): Promise<void> {
    await this.shutdown();
  }

  get activeWorkers(): number {
    return this.liveWorkers.size;
  }

  run(task: FileTask, signal?: AbortSignal): Promise<ProcessingResult> {
    if (signal?.aborted) {
      return Promise.resolve(
        failureResult(task, ProcessingErrorCode.UNKNOWN, 'Worker aborted before start'),
      );
    }

    return new Promise<ProcessingResult>((resolve) => {
      const worker = this.spawn(task);
      let settled = false;

      const settle = (result: ProcessingResult): void => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };

      const onAbort = (): void => {
        settle(failureResult(task, ProcessingErrorCode.UNKNOWN, 'Worker aborted'));
        this.terminate(worker, task.taskId);
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      worker.on('message', (message: unknown) => {
        if (!isWorkerToMainMessage(message)) {
          this.logger.warn({ taskId: task.taskId }, 'Ignoring unrecognised worker message');
          return;
        }
        if (message.payload.taskId !== task.taskId) {
          this.logger.warn(
            { taskId: task.taskId, reportedTaskId: message.payload.taskId },
            'Ignoring result reported for another task',
          );
          return;
        }
        settle(this.toResult(task, message));
        worker.postMessage(createMessage(WorkerMessageType.SHUTDOWN, null));
        this.scheduleForcedStop(worker, task.taskId);
      });

      worker.on('error', (error: Error) => {
        this.logger.error(
          { taskId: task.taskId, error: error.message },
          'Worker thread raised an error',
        );
        settle(
          failureResult(
            task,
            ProcessingErrorCode.WORKER_CRASHED,
            `Worker crashed: ${error.message}`,
          ),
        );
      });

      worker.on('exit', (code: number) => {
        this.liveWorkers.delete(worker);
        if (!settled) {
          this.logger.warn({ taskId: task.taskId, code }, 'Worker exited before reporting');
          settle(
            failureResult(
              task,
              ProcessingErrorCode.WORKER_CRASHED,
              `Worker exited with code ${code} before reporting a result`,
            ),
          );
        }
      });

      worker.postMessage(
        createMessage<ProcessTaskPayload, WorkerMessageType.PROCESS_TASK>(
          WorkerMessageType.PROCESS_TASK,
          { task },
        ),
      );
    });
  }

  async shutdown(): Promise<void> {
    if (this.liveWorkers.size === 0) return;

    this.logger.info({ workers: this.liveWorkers.size }, 'Terminating worker threads');
    const workers = Array.from(this.liveWorkers);
    this.liveWorkers.clear();
    await Promise.all(workers.map((worker) => worker.terminate()));
  }

  private spawn(task: FileTask): Worker {
    const workerData: WorkerInitData = { taskId: task.taskId };
    const worker = new Worker(this.entry.filename, { eval: this.entry.eval, workerData });
    this.liveWorkers.add(worker);
    this.logger.debug({ taskId: task.taskId, fileName: task.fileName }, 'Worker thread spawned');
    return worker;
  }

  private toResult(task: FileTask, message: WorkerToMainMessage): ProcessingResult {
    switch (message.type) {
      case WorkerMessageType.TASK_COMPLETED:
        return message.payload.result;
      case WorkerMessageType.TASK_FAILED:
        return failureResult(
          task,
          ProcessingErrorCode.WORKER_CRASHED,
          `Worker failed: ${message.payload.error.message}`,
          message.payload.processingTimeMs,
        );
    }
  }

  /**
   * A thread that ignores SHUTDOWN is terminated after a grace period.
   */
  private scheduleForcedStop(worker: Worker, taskId: string): void {
    const timer = setTimeout(() => this.terminate(worker, taskId), SHUTDOWN_GRACE_MS);
    timer.unref();
    worker.once('exit', () => clearTimeout(timer));
  }

  private terminate(worker: Worker, taskId: string): void {
    this.liveWorkers.delete(worker);
    worker.terminate().catch((error: unknown) => {
      this.logger.error(
        { taskId, error: error instanceof Error ? error.message : String(error) },
        'Failed to terminate worker thread',
      );
    });
  }
}
