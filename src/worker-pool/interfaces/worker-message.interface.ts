/**
 * Worker Thread Communication Protocol
 *
 * Messages between the thread runner (main thread) and a worker thread.
 * Every message names the task it belongs to, so a result can never be
 * attributed to the wrong file.
 *
 * ```
 * Main Thread                Worker Thread
 *     |                           |
 *     |---PROCESS_TASK----------->|
 *     |                           | (reads + validates file)
 *     |<-------TASK_COMPLETED-----|
 *     |---SHUTDOWN--------------->|
 *     |                           | (exits)
 * ```
 *
 * All payloads are plain data and survive structured cloning.
 *
 * @module WorkerMessageInterface
 */

import { FileTask } from '../../shared/interfaces/file-task.interface';
import { ProcessingResult } from '../../shared/interfaces/processing-result.interface';

export enum WorkerMessageType {
  PROCESS_TASK = 'PROCESS_TASK',
  TASK_COMPLETED = 'TASK_COMPLETED',
  TASK_FAILED = 'TASK_FAILED',
  SHUTDOWN = 'SHUTDOWN',
}

/**
 * @property timestamp - Unix ms when the message was created
 */
export interface WorkerMessage<T = unknown, K extends WorkerMessageType = WorkerMessageType> {
  type: K;
  payload: T;
  timestamp: number;
}

export interface ProcessTaskPayload {
  task: FileTask;
}

export interface TaskCompletedPayload {
  taskId: string;
  result: ProcessingResult;
  processingTimeMs: number;
}

/**
 * Sent when the pipeline itself threw. Malformed files never end up here;
 * they come back as TASK_COMPLETED with a failure result.
 */
export interface TaskFailedPayload {
  taskId: string;
  error: {
    name: string;
    message: string;
  };
  processingTimeMs: number;
}

export interface WorkerInitData {
  taskId: string;
}

export type ProcessTaskMessage = WorkerMessage<ProcessTaskPayload, WorkerMessageType.PROCESS_TASK>;
export type ShutdownMessage = WorkerMessage<null, WorkerMessageType.SHUTDOWN>;
export type TaskCompletedMessage = WorkerMessage<
  TaskCompletedPayload,
  WorkerMessageType.TASK_COMPLETED
>;
export type TaskFailedMessage = WorkerMessage<TaskFailedPayload, WorkerMessageType.TASK_FAILED>;

export type MainToWorkerMessage = ProcessTaskMessage | ShutdownMessage;
export type WorkerToMainMessage = TaskCompletedMessage | TaskFailedMessage;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isMainToWorkerMessage(value: unknown): value is MainToWorkerMessage {
  if (!isRecord(value)) return false;
  if (value.type === WorkerMessageType.SHUTDOWN) return true;
  return (
    value.type === WorkerMessageType.PROCESS_TASK &&
    isRecord(value.payload) &&
    isRecord(value.payload.task) &&
    typeof value.payload.task.taskId === 'string'
  );
}

export function isWorkerToMainMessage(value: unknown): value is WorkerToMainMessage {
  if (!isRecord(value) || !isRecord(value.payload)) return false;
  if (typeof value.payload.taskId !== 'string') return false;
  return (
    value.type === WorkerMessageType.TASK_COMPLETED || value.type === WorkerMessageType.TASK_FAILED
  );
}

export function createMessage<T, K extends WorkerMessageType>(
  type: K,
  payload: T,
): WorkerMessage<T, K> {
  return { type, payload, timestamp: Date.now() };
}
