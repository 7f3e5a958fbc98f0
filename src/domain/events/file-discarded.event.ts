import { DomainEvent } from './base.event';
import { PipelineErrorKind } from '../errors/pipeline.error';

/**
 * File Discarded Event
 * Emitted when a file is deleted from the ingest bucket after failing a check
 */
export interface FileDiscardedEventPayload {
  objectKey: string;
  sourceLocation: string;
  errorKind: PipelineErrorKind;
  reason: string;
}

export class FileDiscardedEvent extends DomainEvent {
  constructor(public readonly payload: FileDiscardedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'file.discarded';
  }

  get objectKey(): string {
    return this.payload.objectKey;
  }

  get errorKind(): PipelineErrorKind {
    return this.payload.errorKind;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
