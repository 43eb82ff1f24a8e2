import { describe, it, expect } from 'vitest';
import { BatchRunEntity } from '../../../src/domain/entities/batch-run.entity';
import { failureResult } from '../../../src/processing/file-processor';
import { ExecutionStatus } from '../../../src/shared/interfaces/batch-result.interface';
import { ProcessingErrorCode } from '../../../src/shared/interfaces/processing-result.interface';
import { createTask } from '../helpers/mock-factories';

const taskA = createTask('/data/a.csv', 'task-a');
const taskB = createTask('/data/b.log', 'task-b');
const taskC = createTask('/data/c.json', 'task-c');

const failed = (task: typeof taskA, reason: string) =>
  failureResult(task, ProcessingErrorCode.FILE_NOT_FOUND, reason);

describe('BatchRunEntity', () => {
  it('starts pending with no results', () => {
    const run = BatchRunEntity.create({ tasks: [taskA, taskB], batchId: 'batch-1' });

    expect(run).toEqual({
      batchId: 'batch-1',
      tasks: [taskA, taskB],
      results: {},
      arrivalOrder: [],
      state: 'pending',
    });
    expect(BatchRunEntity.pendingTasks(run)).toEqual([taskA, taskB]);
  });

  it('rejects duplicate task ids', () => {
    expect(() => BatchRunEntity.create({ tasks: [taskA, taskA] })).toThrow(
      'Task ids must be unique within a batch',
    );
  });

  it('does not mutate the previous state when recording', () => {
    const running = BatchRunEntity.start(BatchRunEntity.create({ tasks: [taskA] }), 10);
    const recorded = BatchRunEntity.recordResult(running, 'task-a', failed(taskA, 'gone'));

    expect(running.results).toEqual({});
    expect(recorded.results['task-a']).toMatchObject({ reason: 'gone' });
  });

  it('keeps the first result for a task', () => {
    let run = BatchRunEntity.start(BatchRunEntity.create({ tasks: [taskA] }), 0);
    run = BatchRunEntity.recordResult(run, 'task-a', failed(taskA, 'first'));
    run = BatchRunEntity.recordResult(run, 'task-a', failed(taskA, 'second'));

    expect(run.results['task-a']).toMatchObject({ reason: 'first' });
    expect(run.arrivalOrder).toEqual(['task-a']);
  });

  it('rejects results for tasks outside the batch', () => {
    const run = BatchRunEntity.create({ tasks: [taskA] });

    expect(() => BatchRunEntity.recordResult(run, 'task-x', failed(taskA, 'x'))).toThrow(
      /Unknown task task-x/,
    );
  });

  it('refuses to complete while tasks are missing a result', () => {
    let run = BatchRunEntity.start(BatchRunEntity.create({ tasks: [taskA, taskB] }), 0);
    run = BatchRunEntity.recordResult(run, 'task-b', failed(taskB, 'b'));

    expect(BatchRunEntity.isComplete(run)).toBe(false);
    expect(() => BatchRunEntity.complete(run, 5)).toThrow(/still has 1 task\(s\) without a result/);
  });

  it('lists entries in submission order and tracks arrival order', () => {
    let run = BatchRunEntity.start(
      BatchRunEntity.create({ tasks: [taskA, taskB, taskC], batchId: 'batch-2' }),
      100,
    );
    run = BatchRunEntity.recordResult(run, 'task-c', failed(taskC, 'c'));
    run = BatchRunEntity.recordResult(run, 'task-a', failed(taskA, 'a'));
    run = BatchRunEntity.recordResult(run, 'task-b', failed(taskB, 'b'));
    run = BatchRunEntity.complete(run, 142.6);

    const result = BatchRunEntity.toBatchResult(run);

    expect(run.arrivalOrder).toEqual(['task-c', 'task-a', 'task-b']);
    expect(result.entries.map((entry) => entry.task.taskId)).toEqual([
      'task-a',
      'task-b',
      'task-c',
    ]);
    expect(Object.keys(result.resultsByTaskId).sort()).toEqual(['task-a', 'task-b', 'task-c']);
    expect(result).toMatchObject({
      batchId: 'batch-2',
      successCount: 0,
      partialCount: 0,
      errorCount: 3,
      totalTimeMs: 43,
      status: ExecutionStatus.ERROR,
    });
  });

  it('builds an empty successful result for an empty batch', () => {
    const run = BatchRunEntity.complete(
      BatchRunEntity.start(BatchRunEntity.create({ tasks: [] }), 0),
      0,
    );

    expect(BatchRunEntity.toBatchResult(run)).toMatchObject({
      entries: [],
      successCount: 0,
      errorCount: 0,
      status: ExecutionStatus.SUCCESS,
    });
  });

  it('only builds a result once completed', () => {
    const run = BatchRunEntity.create({ tasks: [], batchId: 'batch-3' });

    expect(() => BatchRunEntity.toBatchResult(run)).toThrow('Batch batch-3 is not completed');
  });
});
