import { describe, it, expect } from 'vitest';
import {
  WorkerMessageType,
  createMessage,
  isMainToWorkerMessage,
  isWorkerToMainMessage,
} from '../../../src/worker-pool/interfaces/worker-message.interface';
import { createTask } from '../helpers/mock-factories';

describe('worker messages', () => {
  const task = createTask('/data/a.csv', 'task-1');

  it('stamps created messages', () => {
    const message = createMessage(WorkerMessageType.PROCESS_TASK, { task });

    expect(message.type).toBe(WorkerMessageType.PROCESS_TASK);
    expect(message.payload.task).toBe(task);
    expect(typeof message.timestamp).toBe('number');
  });

  it('recognises messages sent to a worker', () => {
    expect(isMainToWorkerMessage(createMessage(WorkerMessageType.PROCESS_TASK, { task }))).toBe(true);
    expect(isMainToWorkerMessage(createMessage(WorkerMessageType.SHUTDOWN, null))).toBe(true);
    expect(isMainToWorkerMessage({ type: WorkerMessageType.PROCESS_TASK, payload: {} })).toBe(false);
    expect(isMainToWorkerMessage('SHUTDOWN')).toBe(false);
  });

  it('requires a task id on worker replies', () => {
    expect(
      isWorkerToMainMessage({
        type: WorkerMessageType.TASK_FAILED,
        payload: { taskId: 'task-1', error: { name: 'Error', message: 'x' }, processingTimeMs: 1 },
        timestamp: 0,
      }),
    ).toBe(true);
    expect(
      isWorkerToMainMessage({ type: WorkerMessageType.TASK_COMPLETED, payload: {}, timestamp: 0 }),
    ).toBe(false);
    expect(
      isWorkerToMainMessage({
        type: WorkerMessageType.SHUTDOWN,
        payload: { taskId: 'task-1' },
        timestamp: 0,
      }),
    ).toBe(false);
    expect(isWorkerToMainMessage(null)).toBe(false);
  });
});
