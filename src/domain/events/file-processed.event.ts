import { FileFormat } from '../../shared/interfaces/file-task.interface';
import {
  ProcessingErrorCode,
  ProcessingStatus,
} from '../../shared/interfaces/processing-result.interface';
import { DomainEvent } from './base.event';

export interface FileProcessedEventPayload {
  batchId: string;
  taskId: string;
  fileName: string;
  format: FileFormat;
  status: ProcessingStatus;
  errorCode?: ProcessingErrorCode;
  lineErrorCount: number;
  durationMs: number;
}

export class FileProcessedEvent extends DomainEvent {
  constructor(public readonly payload: FileProcessedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'file.processed';
  }

  get taskId(): string {
    return this.payload.taskId;
  }

  isFailure(): boolean {
    return this.payload.status === ProcessingStatus.FAILURE;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
