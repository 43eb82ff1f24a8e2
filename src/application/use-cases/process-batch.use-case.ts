import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  BatchCompletedEvent,
  BatchStartedEvent,
  FileProcessedEvent,
  FileTaskEntity,
} from '../../domain';
import {
  BatchCounters,
  BatchEntry,
  BatchExecution,
  ExecutionStatus,
  ExecutionSummary,
} from '../../shared/interfaces/batch-result.interface';
import { FileTask, ProcessingMode } from '../../shared/interfaces/file-task.interface';
import { ProcessingStatus } from '../../shared/interfaces/processing-result.interface';
import { BatchValidationError } from '../errors/batch-validation.error';
import { ProcessBatchCommand, ProcessBatchPort } from '../ports/input/process-batch.port';
import { EventPublisherPort } from '../ports/output/event-publisher.port';
import { EVENT_PUBLISHER_PORT } from '../ports/tokens';
import { RunBenchmarkUseCase } from './run-benchmark.use-case';
import { RunParallelUseCase } from './run-parallel.use-case';
import { RunSequentialUseCase } from './run-sequential.use-case';

function isProcessingMode(value: string): value is ProcessingMode {
  return Object.values(ProcessingMode).some((mode) => mode === value);
}

interface ValidatedCommand {
  paths: readonly string[];
  mode: ProcessingMode;
  timeoutMs?: number;
}

export function validateBatchCommand(command: ProcessBatchCommand): ValidatedCommand {
  const issues: string[] = [];

  const mode = command.mode.trim().toLowerCase();
  if (!isProcessingMode(mode)) {
    issues.push(
      `Unknown mode "${command.mode}" (expected ${Object.values(ProcessingMode).join(', ')})`,
    );
  }

  command.paths.forEach((filePath, index) => {
    if (filePath.trim() === '') {
      issues.push(`Path at index ${index} is empty`);
    }
  });

  if (
    command.timeoutMs !== undefined &&
    (!Number.isFinite(command.timeoutMs) || command.timeoutMs <= 0)
  ) {
    issues.push(`timeoutMs must be a positive number (got ${command.timeoutMs})`);
  }

  if (issues.length > 0 || !isProcessingMode(mode)) {
    throw new BatchValidationError(issues);
  }

  return { paths: command.paths, mode, timeoutMs: command.timeoutMs };
}

export function buildSummary(
  tasks: readonly FileTask[],
  mode: ProcessingMode,
  totalTimeMs: number,
  status: ExecutionStatus,
): ExecutionSummary {
  return {
    files: tasks.map((task) => task.fileName).join(', '),
    mode,
    totalTimeMs,
    status,
  };
}

/**
 * Process Batch Use Case
 * Validates the request, builds one task per path, runs the requested
 * mode and publishes batch.started / file.processed / batch.completed.
 * Benchmark runs publish no per-file events, since every file runs twice.
 */
@Injectable()
export class ProcessBatchUseCase implements ProcessBatchPort {
  private readonly logger = new Logger(ProcessBatchUseCase.name);

  constructor(
    private readonly sequential: RunSequentialUseCase,
    private readonly parallel: RunParallelUseCase,
    private readonly benchmark: RunBenchmarkUseCase,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
  ) {}

  async execute(command: ProcessBatchCommand): Promise<BatchExecution> {
    const { paths, mode, timeoutMs } = validateBatchCommand(command);
    const tasks = FileTaskEntity.fromPaths(paths);
    const batchId = uuidv4();

    this.logger.log(`Batch ${batchId}: ${tasks.length} file(s) in ${mode} mode`);
    await this.eventPublisher.publish(
      new BatchStartedEvent({
        batchId,
        mode,
        fileCount: tasks.length,
        fileNames: tasks.map((task) => task.fileName),
      }),
    );

    const onResult = (entry: BatchEntry): void => this.publishFileProcessed(batchId, entry);
    const execution = await this.runMode(mode, tasks, batchId, timeoutMs, onResult);

    const counters: BatchCounters =
      execution.mode === ProcessingMode.BENCHMARK ? execution.report.parallel : execution.result;
    await this.eventPublisher.publish(
      new BatchCompletedEvent({
        batchId,
        mode,
        status: execution.summary.status,
        successCount: counters.successCount,
        partialCount: counters.partialCount,
        errorCount: counters.errorCount,
        totalTimeMs: execution.summary.totalTimeMs,
      }),
    );

    return execution;
  }

  private async runMode(
    mode: ProcessingMode,
    tasks: FileTask[],
    batchId: string,
    timeoutMs: number | undefined,
    onResult: (entry: BatchEntry) => void,
  ): Promise<BatchExecution> {
    switch (mode) {
      case ProcessingMode.SEQUENTIAL: {
        const result = await this.sequential.execute({ tasks, batchId, onResult });
        return {
          mode,
          result,
          summary: buildSummary(tasks, mode, result.totalTimeMs, result.status),
        };
      }
      case ProcessingMode.PARALLEL: {
        const result = await this.parallel.execute({ tasks, batchId, timeoutMs, onResult });
        return {
          mode,
          result,
          summary: buildSummary(tasks, mode, result.totalTimeMs, result.status),
        };
      }
      case ProcessingMode.BENCHMARK: {
        const report = await this.benchmark.execute({ tasks, timeoutMs });
        const totalTimeMs = Math.round(report.sequentialMs + report.parallelMs);
        return {
          mode,
          report,
          summary: buildSummary(tasks, mode, totalTimeMs, report.parallel.status),
        };
      }
    }
  }

  private publishFileProcessed(batchId: string, { task, result }: BatchEntry): void {
    this.eventPublisher.publishAsync(
      new FileProcessedEvent({
        batchId,
        taskId: task.taskId,
        fileName: result.fileName,
        format: result.format,
        status: result.status,
        ...(result.status === ProcessingStatus.FAILURE && { errorCode: result.errorCode }),
        lineErrorCount: result.errors.length,
        durationMs: result.durationMs,
      }),
    );
  }
}
