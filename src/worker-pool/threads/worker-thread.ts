/**
 * Worker Thread Entry Point
 *
 * Runs in its own V8 isolate. The thread runner spawns one of these per
 * file, posts a single PROCESS_TASK, waits for the reply and then sends
 * SHUTDOWN.
 *
 * Lifecycle:
 * 1. Spawned with `workerData.taskId`
 * 2. PROCESS_TASK: runs the file pipeline and posts TASK_COMPLETED
 *    (or TASK_FAILED when the pipeline itself throws)
 * 3. SHUTDOWN: exits with code 0
 *
 * Anything uncaught exits with code 1, which the runner reports as a
 * crashed worker for this task only.
 *
 * Keep this module's imports free of Nest: it is loaded on its own inside
 * the thread.
 *
 * @module WorkerThread
 */

import { parentPort, workerData } from 'worker_threads';
import { performance } from 'perf_hooks';
import { processFile } from '../../processing/file-processor';
import {
  MainToWorkerMessage,
  TaskCompletedPayload,
  TaskFailedPayload,
  WorkerMessageType,
  createMessage,
  isMainToWorkerMessage,
} from '../interfaces/worker-message.interface';
import { FileTask } from '../../shared/interfaces/file-task.interface';

function expectedTaskId(): string | undefined {
  if (typeof workerData === 'object' && workerData !== null && 'taskId' in workerData) {
    const { taskId } = workerData;
    return typeof taskId === 'string' ? taskId : undefined;
  }
  return undefined;
}

async function handleProcessTask(task: FileTask): Promise<void> {
  const startedAt = performance.now();

  try {
    const result = await processFile(task);
    parentPort?.postMessage(
      createMessage<TaskCompletedPayload, WorkerMessageType.TASK_COMPLETED>(
        WorkerMessageType.TASK_COMPLETED,
        {
          taskId: task.taskId,
          result,
          processingTimeMs: Math.round(performance.now() - startedAt),
        },
      ),
    );
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    parentPort?.postMessage(
      createMessage<TaskFailedPayload, WorkerMessageType.TASK_FAILED>(
        WorkerMessageType.TASK_FAILED,
        {
          taskId: task.taskId,
          error: { name: err.name, message: err.message },
          processingTimeMs: Math.round(performance.now() - startedAt),
        },
      ),
    );
  }
}

async function handleMessage(message: MainToWorkerMessage): Promise<void> {
  switch (message.type) {
    case WorkerMessageType.PROCESS_TASK: {
      const { task } = message.payload;
      const taskId = expectedTaskId();
      if (taskId !== undefined && taskId !== task.taskId) {
        throw new Error(`Worker for task ${taskId} received task ${task.taskId}`);
      }
      return handleProcessTask(task);
    }
    case WorkerMessageType.SHUTDOWN:
      process.exit(0);
  }
}

parentPort?.on('message', (message: unknown) => {
  if (!isMainToWorkerMessage(message)) {
    console.error('Worker received an unknown message', message);
    return;
  }
  handleMessage(message).catch((error: unknown) => {
    console.error('Worker failed to handle message:', error);
    process.exit(1);
  });
});

process.on('uncaughtException', (error) => {
  console.error('Uncaught exception in worker thread:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled rejection in worker thread:', reason);
  process.exit(1);
});
