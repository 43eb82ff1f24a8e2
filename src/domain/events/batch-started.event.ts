import { ProcessingMode } from '../../shared/interfaces/file-task.interface';
import { DomainEvent } from './base.event';

/**
 * Batch Started Event
 * Emitted once the tasks of a batch are built and the mode is accepted
 */
export interface BatchStartedEventPayload {
  batchId: string;
  mode: ProcessingMode;
  fileCount: number;
  fileNames: string[];
}

export class BatchStartedEvent extends DomainEvent {
  constructor(public readonly payload: BatchStartedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'batch.started';
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
