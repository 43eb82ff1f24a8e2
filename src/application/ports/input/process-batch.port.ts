import { BatchExecution } from '../../../shared/interfaces/batch-result.interface';

export interface ProcessBatchCommand {
  paths: readonly string[];
  /** `sequential`, `parallel` or `benchmark` */
  mode: string;
  timeoutMs?: number;
}

/**
 * Process Batch Port (Driving Port)
 * Single entry point: builds tasks, runs the requested mode, summarises
 */
export interface ProcessBatchPort {
  execute(command: ProcessBatchCommand): Promise<BatchExecution>;
}
