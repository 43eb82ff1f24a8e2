import { ExecutionStatus } from '../../shared/interfaces/batch-result.interface';
import { ProcessingMode } from '../../shared/interfaces/file-task.interface';
import { DomainEvent } from './base.event';

/**
 * Batch Completed Event
 * Emitted after every file of the batch has a result
 */
export interface BatchCompletedEventPayload {
  batchId: string;
  mode: ProcessingMode;
  status: ExecutionStatus;
  successCount: number;
  partialCount: number;
  errorCount: number;
  totalTimeMs: number;
}

export class BatchCompletedEvent extends DomainEvent {
  constructor(public readonly payload: BatchCompletedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'batch.completed';
  }

  get batchId(): string {
    return this.payload.batchId;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
