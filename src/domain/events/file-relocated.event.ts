import { DomainEvent } from './base.event';

/**
 * File Relocated Event
 * Emitted when a verified-clean file reaches the destination bucket
 */
export interface FileRelocatedEventPayload {
  objectKey: string;
  sourceLocation: string;
  destinationLocation: string;
  metadataStripped: boolean;
  processingDurationMs: number;
}

export class FileRelocatedEvent extends DomainEvent {
  constructor(public readonly payload: FileRelocatedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'file.relocated';
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
