/**
 * Domain Events Barrel Export
 */
export { DomainEvent } from './base.event';
export { BatchStartedEvent, type BatchStartedEventPayload } from './batch-started.event';
export { FileProcessedEvent, type FileProcessedEventPayload } from './file-processed.event';
export { BatchCompletedEvent, type BatchCompletedEventPayload } from './batch-completed.event';
