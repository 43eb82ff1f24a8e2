import { FileTask } from '../../../shared/interfaces/file-task.interface';
import { ProcessingResult } from '../../../shared/interfaces/processing-result.interface';

export type WorkerStrategy = 'thread' | 'inline';

/**
 * Worker Runner Port (Driven Port)
 * Runs the file pipeline for one task in an isolated unit of execution
 */
export interface WorkerRunnerPort {
  readonly strategy: WorkerStrategy;

  /**
   * Resolve with exactly one result for the task. Never rejects: faults
   * inside the worker come back as a failure result. When the signal
   * aborts, the worker is stopped and the promise settles with a failure.
   */
  run(task: FileTask, signal?: AbortSignal): Promise<ProcessingResult>;

  /**
   * Stop every worker still running
   */
  shutdown(): Promise<void>;
}
