import { FileTask, ProcessingMode } from './file-task.interface';
import { ProcessingResult } from './processing-result.interface';

export enum ExecutionStatus {
  SUCCESS = 'success',
  PARTIAL = 'partial',
  ERROR = 'error',
}

export interface BatchEntry {
  task: FileTask;
  result: ProcessingResult;
}

export interface BatchCounters {
  successCount: number;
  partialCount: number;
  errorCount: number;
}

/**
 * Outcome of running one set of tasks through one execution path.
 * `entries` follow submission order regardless of completion order.
 */
export interface BatchResult extends BatchCounters {
  batchId: string;
  entries: BatchEntry[];
  resultsByTaskId: Record<string, ProcessingResult>;
  totalTimeMs: number;
  status: ExecutionStatus;
}

export interface BenchmarkStats {
  sequentialMs: number;
  parallelMs: number;
  improvement: number;
  percentFaster: number;
  timeSavedMs: number;
  winner: 'parallel' | 'sequential' | 'tie';
}

/** Files per supported format; unsupported files are left out. */
export interface FormatCounts {
  csv: number;
  json: number;
  log: number;
}

export interface BenchmarkModeStats {
  /** Share of fully successful files, one decimal. */
  successRate: number;
  byFormat: FormatCounts;
}

export interface BenchmarkReport extends BenchmarkStats {
  fileCount: number;
  sequential: BatchResult;
  parallel: BatchResult;
  sequentialStats: BenchmarkModeStats;
  parallelStats: BenchmarkModeStats;
  /** Both paths produced the same success, partial and error counts. */
  consistent: boolean;
}

export interface ExecutionSummary {
  files: string;
  mode: ProcessingMode;
  totalTimeMs: number;
  status: ExecutionStatus;
}

export type BatchExecution =
  | { mode: ProcessingMode.SEQUENTIAL; result: BatchResult; summary: ExecutionSummary }
  | { mode: ProcessingMode.PARALLEL; result: BatchResult; summary: ExecutionSummary }
  | { mode: ProcessingMode.BENCHMARK; report: BenchmarkReport; summary: ExecutionSummary };
