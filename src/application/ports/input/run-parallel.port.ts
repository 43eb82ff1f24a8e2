import { BatchEntry, BatchResult } from '../../../shared/interfaces/batch-result.interface';
import { FileTask } from '../../../shared/interfaces/file-task.interface';

export interface RunParallelCommand {
  tasks: readonly FileTask[];
  timeoutMs?: number;
  batchId?: string;
  onResult?: (entry: BatchEntry) => void;
}

/**
 * Run Parallel Port (Driving Port)
 * Processes every file in its own worker and gathers the results
 */
export interface RunParallelPort {
  execute(command: RunParallelCommand): Promise<BatchResult>;
}
