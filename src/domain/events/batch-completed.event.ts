import { DomainEvent } from './base.event';
import { BatchSummary } from '../value-objects/batch-result.vo';

/**
 * Batch Completed Event
 * Emitted once per batch invocation, including configuration failures
 */
export interface BatchCompletedEventPayload {
  batchId: string;
  summary: BatchSummary;
  failedKeys: readonly string[];
  durationMs: number;
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
