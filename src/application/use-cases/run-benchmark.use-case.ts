import { Injectable, Logger } from '@nestjs/common';
import { performance } from 'perf_hooks';
import { roundTo } from '../../processing/parsers/parsing-utils';
import {
  BatchResult,
  BenchmarkModeStats,
  BenchmarkReport,
  BenchmarkStats,
  FormatCounts,
} from '../../shared/interfaces/batch-result.interface';
import { FileFormat } from '../../shared/interfaces/file-task.interface';
import { ProcessingStatus } from '../../shared/interfaces/processing-result.interface';
import { RunBenchmarkCommand, RunBenchmarkPort } from '../ports/input/run-benchmark.port';
import { RunParallelUseCase } from './run-parallel.use-case';
import { RunSequentialUseCase } from './run-sequential.use-case';

/**
 * Compare two wall-clock timings.
 *
 * improvement = sequential / parallel (2 decimals, 0 when parallel is 0);
 * percentFaster = (sequential - parallel) / sequential * 100 (1 decimal,
 * 0 when sequential is 0).
 */
export function computeBenchmarkStats(sequentialMs: number, parallelMs: number): BenchmarkStats {
  const improvement = parallelMs > 0 ? roundTo(sequentialMs / parallelMs, 2) : 0;
  const percentFaster =
    sequentialMs > 0 ? roundTo(((sequentialMs - parallelMs) / sequentialMs) * 100, 1) : 0;

  let winner: BenchmarkStats['winner'] = 'tie';
  if (parallelMs < sequentialMs) winner = 'parallel';
  else if (sequentialMs < parallelMs) winner = 'sequential';

  return {
    sequentialMs,
    parallelMs,
    improvement,
    percentFaster,
    timeSavedMs: roundTo(Math.abs(sequentialMs - parallelMs), 2),
    winner,
  };
}

export function computeModeStats(batch: BatchResult): BenchmarkModeStats {
  const byFormat: FormatCounts = { csv: 0, json: 0, log: 0 };
  let successes = 0;

  for (const { result } of batch.entries) {
    if (result.status === ProcessingStatus.SUCCESS) successes++;
    switch (result.format) {
      case FileFormat.CSV:
        byFormat.csv++;
        break;
      case FileFormat.JSON:
        byFormat.json++;
        break;
      case FileFormat.LOG:
        byFormat.log++;
        break;
      default:
        break;
    }
  }

  const total = batch.entries.length;
  return {
    successRate: total > 0 ? roundTo((successes / total) * 100, 1) : 0,
    byFormat,
  };
}

export function sameOutcomeCounts(a: BatchResult, b: BatchResult): boolean {
  return (
    a.successCount === b.successCount &&
    a.partialCount === b.partialCount &&
    a.errorCount === b.errorCount
  );
}

/**
 * Run Benchmark Use Case
 * Sequential run first, then the parallel run, over the same tasks
 */
@Injectable()
export class RunBenchmarkUseCase implements RunBenchmarkPort {
  private readonly logger = new Logger(RunBenchmarkUseCase.name);

  constructor(
    private readonly sequential: RunSequentialUseCase,
    private readonly parallel: RunParallelUseCase,
  ) {}

  async execute(command: RunBenchmarkCommand): Promise<BenchmarkReport> {
    const { tasks } = command;

    let startedAt = performance.now();
    const sequential = await this.sequential.execute({ tasks });
    const sequentialMs = roundTo(performance.now() - startedAt, 2);

    startedAt = performance.now();
    const parallel = await this.parallel.execute({ tasks, timeoutMs: command.timeoutMs });
    const parallelMs = roundTo(performance.now() - startedAt, 2);

    // nothing was processed, so there is nothing to compare
    const stats =
      tasks.length === 0 ? computeBenchmarkStats(0, 0) : computeBenchmarkStats(sequentialMs, parallelMs);

    const consistent = sameOutcomeCounts(sequential, parallel);

    this.logger.log(
      `Benchmark over ${tasks.length} file(s): sequential ${stats.sequentialMs}ms, ` +
        `parallel ${stats.parallelMs}ms, winner ${stats.winner} (x${stats.improvement})`,
    );
    if (!consistent) {
      this.logger.warn(
        `Outcome counts differ: sequential ${sequential.successCount}/${sequential.partialCount}/${sequential.errorCount}, ` +
          `parallel ${parallel.successCount}/${parallel.partialCount}/${parallel.errorCount}`,
      );
    }

    return {
      ...stats,
      fileCount: tasks.length,
      sequential,
      parallel,
      sequentialStats: computeModeStats(sequential),
      parallelStats: computeModeStats(parallel),
      consistent,
    };
  }
}
