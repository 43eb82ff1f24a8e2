import { BatchEntry, BatchResult } from '../../../shared/interfaces/batch-result.interface';
import { FileTask } from '../../../shared/interfaces/file-task.interface';

export interface RunSequentialCommand {
  tasks: readonly FileTask[];
  batchId?: string;
  onResult?: (entry: BatchEntry) => void;
}

/**
 * Run Sequential Port (Driving Port)
 * Processes files one at a time, in input order, on the calling thread
 */
export interface RunSequentialPort {
  execute(command: RunSequentialCommand): Promise<BatchResult>;
}
