import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { performance } from 'perf_hooks';
import { WorkerRunnerPort } from '../application/ports/output/worker-runner.port';
import { WORKER_RUNNER_PORT } from '../application/ports/tokens';
import { AppConfig } from '../config/configuration';
import { BatchRunEntity } from '../domain/entities/batch-run.entity';
import { failureResult } from '../processing/file-processor';
import { BatchEntry, BatchResult } from '../shared/interfaces/batch-result.interface';
import { FileTask } from '../shared/interfaces/file-task.interface';
import {
  ProcessingErrorCode,
  ProcessingResult,
  ProcessingStatus,
} from '../shared/interfaces/processing-result.interface';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import { CoordinatorStats } from './interfaces/coordinator-stats.interface';

export interface CoordinatorRunOptions {
  /** Per-worker budget, measured from that worker's dispatch */
  timeoutMs?: number;
  batchId?: string;
  /** Called once per task, in arrival order */
  onResult?: (entry: BatchEntry) => void;
}

/**
 * A task waiting for a worker slot, with the resolver of its result.
 */
interface QueuedTask {
  task: FileTask;
  timeoutMs: number;
  resolve: (result: ProcessingResult) => void;
  queuedAt: number;
}

type Outcome = 'completed' | 'failed' | 'timedOut';

/**
 * Coordinator Service
 *
 * Fans a batch out to one worker per task and gathers exactly one result
 * per task.
 *
 * - Each dispatched worker gets its own timer and AbortController. On
 *   expiry the coordinator records WORKER_TIMEOUT for that task and aborts
 *   only that worker; a result arriving afterwards is discarded.
 * - A runner that rejects is converted to WORKER_CRASHED here, so one bad
 *   worker never fails the batch.
 * - With MAX_CONCURRENT_WORKERS > 0, tasks beyond the limit wait in FIFO
 *   order; a queued task's timer starts when it is dispatched.
 * - The batch result lists entries in submission order, whatever the
 *   completion order was.
 */
@Injectable()
export class CoordinatorService implements OnModuleDestroy {
  private taskQueue: QueuedTask[] = [];
  private activeCount = 0;
  private isShuttingDown = false;

  private dispatchedCount = 0;
  private completedCount = 0;
  private failedCount = 0;
  private timedOutCount = 0;
  private totalProcessingTimeMs = 0;

  private readonly defaultTimeoutMs: number;
  private readonly maxConcurrent: number;
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(WORKER_RUNNER_PORT) private readonly runner: WorkerRunnerPort,
    configService: ConfigService<AppConfig>,
    logger: PinoLoggerService,
  ) {
    const workerConfig = configService.getOrThrow('worker', { infer: true });
    this.defaultTimeoutMs = workerConfig.timeoutMs;
    this.maxConcurrent = workerConfig.maxConcurrent;
    this.logger = logger.child({ component: CoordinatorService.name });
  }

  async onModuleDestroy(): Promise<void> {
    await this.shutdown();
  }

  get strategy(): WorkerRunnerPort['strategy'] {
    return this.runner.strategy;
  }

  async run(tasks: readonly FileTask[], options: CoordinatorRunOptions = {}): Promise<BatchResult> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new RangeError(`timeoutMs must be a positive number (got ${timeoutMs})`);
    }
    if (this.isShuttingDown) {
      throw new Error('Coordinator is shutting down');
    }

    let batch = BatchRunEntity.start(
      BatchRunEntity.create({ tasks, batchId: options.batchId }),
      performance.now(),
    );
    const log = this.logger.withBatchId(batch.batchId);
    log.info(
      {
        files: tasks.length,
        timeoutMs,
        maxConcurrent: this.maxConcurrent,
        strategy: this.runner.strategy,
      },
      'Dispatching workers',
    );

    await Promise.all(
      tasks.map(async (task) => {
        const result = await this.schedule(task, timeoutMs);
        batch = BatchRunEntity.recordResult(batch, task.taskId, result);
        this.notify(options.onResult, { task, result }, log);
      }),
    );

    batch = BatchRunEntity.complete(batch, performance.now());
    const batchResult = BatchRunEntity.toBatchResult(batch);

    log.info(
      {
        successCount: batchResult.successCount,
        partialCount: batchResult.partialCount,
        errorCount: batchResult.errorCount,
        totalTimeMs: batchResult.totalTimeMs,
      },
      'All workers reported',
    );

    return batchResult;
  }

  getStats(): CoordinatorStats {
    const finished = this.completedCount + this.failedCount + this.timedOutCount;
    return {
      maxConcurrent: this.maxConcurrent,
      dispatched: this.dispatchedCount,
      completed: this.completedCount,
      failed: this.failedCount,
      timedOut: this.timedOutCount,
      active: this.activeCount,
      queued: this.taskQueue.length,
      averageProcessingTimeMs:
        finished > 0 ? Math.round(this.totalProcessingTimeMs / finished) : 0,
    };
  }

  /**
   * Resolve queued tasks as failures, then stop the running workers.
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    const pending = this.taskQueue;
    this.taskQueue = [];
    for (const queued of pending) {
      queued.resolve(
        failureResult(queued.task, ProcessingErrorCode.UNKNOWN, 'Coordinator is shutting down'),
      );
    }

    this.logger.info({ drained: pending.length, active: this.activeCount }, 'Stopping workers');
    await this.runner.shutdown();
  }

  private schedule(task: FileTask, timeoutMs: number): Promise<ProcessingResult> {
    return new Promise<ProcessingResult>((resolve) => {
      const queued: QueuedTask = { task, timeoutMs, resolve, queuedAt: performance.now() };

      if (this.hasCapacity()) {
        this.dispatch(queued);
        return;
      }

      this.taskQueue.push(queued);
      this.logger.debug(
        { taskId: task.taskId, queueLength: this.taskQueue.length },
        'Task queued, all worker slots busy',
      );
    });
  }

  private hasCapacity(): boolean {
    return this.maxConcurrent === 0 || this.activeCount < this.maxConcurrent;
  }

  private dispatch(queued: QueuedTask): void {
    const { task, timeoutMs } = queued;
    const controller = new AbortController();
    const startedAt = performance.now();
    let finished = false;

    this.activeCount++;
    this.dispatchedCount++;

    const finish = (result: ProcessingResult, outcome: Outcome): void => {
      finished = true;
      clearTimeout(timer);
      this.activeCount--;
      this.recordOutcome(outcome, performance.now() - startedAt);
      queued.resolve(result);
      this.processNextInQueue();
    };

    const timer = setTimeout(() => {
      if (finished) return;
      this.logger.warn(
        { taskId: task.taskId, fileName: task.fileName, timeoutMs },
        'Worker timed out',
      );
      finish(
        failureResult(
          task,
          ProcessingErrorCode.WORKER_TIMEOUT,
          `Worker timeout after ${timeoutMs}ms`,
          Math.round(performance.now() - startedAt),
        ),
        'timedOut',
      );
      controller.abort();
    }, timeoutMs);

    this.logger.debug(
      { taskId: task.taskId, fileName: task.fileName, waitedMs: Math.round(startedAt - queued.queuedAt) },
      'Worker dispatched',
    );

    this.invokeRunner(task, controller.signal)
      .then((result) => {
        if (finished) {
          this.logger.debug({ taskId: task.taskId }, 'Discarding result that arrived after timeout');
          return;
        }
        finish(result, result.status === ProcessingStatus.FAILURE ? 'failed' : 'completed');
      })
      .catch((error: unknown) => {
        this.logger.error(
          { taskId: task.taskId, error: error instanceof Error ? error.message : String(error) },
          'Failed to record worker result',
        );
      });
  }

  /**
   * The worker boundary: whatever the runner does, the task gets a result.
   */
  private async invokeRunner(task: FileTask, signal: AbortSignal): Promise<ProcessingResult> {
    try {
      return await this.runner.run(task, signal);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ taskId: task.taskId, error: message }, 'Worker runner rejected');
      return failureResult(task, ProcessingErrorCode.WORKER_CRASHED, `Worker crashed: ${message}`);
    }
  }

  private processNextInQueue(): void {
    while (this.taskQueue.length > 0 && this.hasCapacity()) {
      const next = this.taskQueue.shift();
      if (next) {
        this.dispatch(next);
      }
    }
  }

  private recordOutcome(outcome: Outcome, elapsedMs: number): void {
    this.totalProcessingTimeMs += elapsedMs;
    switch (outcome) {
      case 'completed':
        this.completedCount++;
        break;
      case 'failed':
        this.failedCount++;
        break;
      case 'timedOut':
        this.timedOutCount++;
        break;
    }
  }

  private notify(
    onResult: CoordinatorRunOptions['onResult'],
    entry: BatchEntry,
    log: PinoLoggerService,
  ): void {
    if (!onResult) return;
    try {
      onResult(entry);
    } catch (error) {
      log.error(
        {
          taskId: entry.task.taskId,
          error: error instanceof Error ? error.message : String(error),
        },
        'onResult callback threw',
      );
    }
  }
}
