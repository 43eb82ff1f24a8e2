import { WorkerRunnerPort } from '../../src/application/ports/output/worker-runner.port';
import { failureResult, processFile } from '../../src/processing/file-processor';
import { FileTask } from '../../src/shared/interfaces/file-task.interface';
import {
  ProcessingErrorCode,
  ProcessingResult,
} from '../../src/shared/interfaces/processing-result.interface';

/**
 * What the scripted worker does for one file name.
 * - `delayMs`: wait before answering (the real pipeline still runs)
 * - `hang`: never answer unless aborted
 * - `throw`: reject with this message
 */
export interface WorkerScript {
  delayMs?: number;
  hang?: boolean;
  throw?: string;
}

/**
 * Scripted Worker Runner
 * Runs the real file pipeline in-process, with per-file delays, hangs and
 * faults to exercise the coordinator's timeout and isolation handling.
 */
export class ScriptedWorkerRunner implements WorkerRunnerPort {
  readonly strategy = 'inline' as const;

  readonly started: string[] = [];
  readonly aborted: string[] = [];
  private running = 0;
  maxObservedConcurrency = 0;
  shutdownCalls = 0;

  constructor(private readonly scripts: Record<string, WorkerScript> = {}) {}

  async run(task: FileTask, signal?: AbortSignal): Promise<ProcessingResult> {
    this.started.push(task.fileName);
    this.running++;
    this.maxObservedConcurrency = Math.max(this.maxObservedConcurrency, this.running);

    try {
      const script = this.scripts[task.fileName] ?? {};
      if (script.throw !== undefined) {
        throw new Error(script.throw);
      }
      const completed = await this.wait(task, script, signal);
      if (!completed) {
        return failureResult(task, ProcessingErrorCode.UNKNOWN, 'Worker aborted');
      }
      return await processFile(task);
    } finally {
      this.running--;
    }
  }

  async shutdown(): Promise<void> {
    this.shutdownCalls++;
  }

  /**
   * Resolves true once the scripted delay elapsed, false when aborted first.
   */
  private wait(task: FileTask, script: WorkerScript, signal?: AbortSignal): Promise<boolean> {
    if (!script.hang && !script.delayMs) {
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      const timer = script.hang
        ? undefined
        : setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve(true);
          }, script.delayMs);
      const onAbort = (): void => {
        clearTimeout(timer);
        this.aborted.push(task.fileName);
        resolve(false);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
