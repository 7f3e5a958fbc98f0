/**
 * Domain Events Barrel Export
 */
export { DomainEvent } from './base.event';
export { FileRelocatedEvent, type FileRelocatedEventPayload } from './file-relocated.event';
export { FileDiscardedEvent, type FileDiscardedEventPayload } from './file-discarded.event';
export { FileFailedEvent, type FileFailedEventPayload } from './file-failed.event';
export { BatchCompletedEvent, type BatchCompletedEventPayload } from './batch-completed.event';
