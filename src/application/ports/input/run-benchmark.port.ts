import { BenchmarkReport } from '../../../shared/interfaces/batch-result.interface';
import { FileTask } from '../../../shared/interfaces/file-task.interface';

export interface RunBenchmarkCommand {
  tasks: readonly FileTask[];
  timeoutMs?: number;
}

/**
 * Run Benchmark Port (Driving Port)
 * Runs the same tasks sequentially, then in parallel, and compares timings
 */
export interface RunBenchmarkPort {
  execute(command: RunBenchmarkCommand): Promise<BenchmarkReport>;
}
