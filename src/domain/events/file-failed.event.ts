import { DomainEvent } from './base.event';
import { PipelineErrorKind } from '../errors/pipeline.error';

export interface FileFailedEventPayload {
  objectKey: string;
  sourceLocation: string;
  errorKind: PipelineErrorKind;
  errorMessage: string;
  sourceDiscarded: boolean;
}

export class FileFailedEvent extends DomainEvent {
  constructor(public readonly payload: FileFailedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'file.failed';
  }

  get objectKey(): string {
    return this.payload.objectKey;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
