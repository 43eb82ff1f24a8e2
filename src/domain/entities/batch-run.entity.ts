import { produce } from 'immer';
import { v4 as uuidv4 } from 'uuid';
import { BatchEntry, BatchResult } from '../../shared/interfaces/batch-result.interface';
import { FileTask } from '../../shared/interfaces/file-task.interface';
import { ProcessingResult } from '../../shared/interfaces/processing-result.interface';
import { ExecutionStatusVO, countOutcomes } from '../value-objects/execution-status.vo';

/**
 * Batch Run Entity - one pass of a task list through an execution path.
 *
 * Status Transitions:
 * PENDING → RUNNING → COMPLETED
 *
 * Results are recorded in arrival order; the first result for a task wins.
 * The batch result is assembled in submission order.
 */

export type BatchRunState = 'pending' | 'running' | 'completed';

export interface BatchRunEntityData {
  readonly batchId: string;
  readonly tasks: readonly FileTask[];
  readonly results: Readonly<Record<string, ProcessingResult>>;
  readonly arrivalOrder: readonly string[];
  readonly state: BatchRunState;
  readonly startedAt?: number;
  readonly completedAt?: number;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace BatchRunEntity {
  export interface CreateProps {
    tasks: readonly FileTask[];
    batchId?: string;
  }

  export function create(props: CreateProps): BatchRunEntityData {
    const taskIds = new Set(props.tasks.map((task) => task.taskId));
    if (taskIds.size !== props.tasks.length) {
      throw new Error('Task ids must be unique within a batch');
    }

    return {
      batchId: props.batchId ?? uuidv4(),
      tasks: props.tasks,
      results: {},
      arrivalOrder: [],
      state: 'pending',
    };
  }

  export function start(run: BatchRunEntityData, at: number): BatchRunEntityData {
    if (run.state !== 'pending') {
      throw new Error(`Cannot start batch ${run.batchId} in state ${run.state}`);
    }
    return produce(run, (draft) => {
      draft.state = 'running';
      draft.startedAt = at;
    });
  }

  export function hasResult(run: BatchRunEntityData, taskId: string): boolean {
    return Object.prototype.hasOwnProperty.call(run.results, taskId);
  }

  export function recordResult(
    run: BatchRunEntityData,
    taskId: string,
    result: ProcessingResult,
  ): BatchRunEntityData {
    if (!run.tasks.some((task) => task.taskId === taskId)) {
      throw new Error(`Unknown task ${taskId} for batch ${run.batchId}`);
    }
    if (hasResult(run, taskId)) {
      return run;
    }
    return produce(run, (draft) => {
      draft.results[taskId] = result;
      draft.arrivalOrder.push(taskId);
    });
  }

  export function isComplete(run: BatchRunEntityData): boolean {
    return run.tasks.every((task) => hasResult(run, task.taskId));
  }

  export function pendingTasks(run: BatchRunEntityData): FileTask[] {
    return run.tasks.filter((task) => !hasResult(run, task.taskId));
  }

  export function complete(run: BatchRunEntityData, at: number): BatchRunEntityData {
    if (!isComplete(run)) {
      throw new Error(
        `Batch ${run.batchId} still has ${pendingTasks(run).length} task(s) without a result`,
      );
    }
    return produce(run, (draft) => {
      draft.state = 'completed';
      draft.completedAt = at;
    });
  }

  export function elapsedMs(run: BatchRunEntityData): number {
    if (run.startedAt === undefined || run.completedAt === undefined) {
      return 0;
    }
    return Math.round(run.completedAt - run.startedAt);
  }

  export function toBatchResult(run: BatchRunEntityData): BatchResult {
    if (run.state !== 'completed') {
      throw new Error(`Batch ${run.batchId} is not completed`);
    }

    const entries: BatchEntry[] = run.tasks.map((task) => ({
      task,
      result: run.results[task.taskId],
    }));
    const counters = countOutcomes(entries.map((entry) => entry.result));

    return {
      batchId: run.batchId,
      entries,
      resultsByTaskId: { ...run.results },
      ...counters,
      totalTimeMs: elapsedMs(run),
      status: ExecutionStatusVO.fromCounters(counters).value,
    };
  }
}
