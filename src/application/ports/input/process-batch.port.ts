import { FileEvent, RejectedRecord } from '../../../domain/value-objects/file-event.vo';
import { BatchResultVO } from '../../../domain/value-objects/batch-result.vo';

/**
 * Process Batch Command
 */
export interface ProcessBatchCommand {
  /** Correlates logs and events for this invocation; generated when absent. */
  batchId?: string;
  events: FileEvent[];
  /** Records the trigger delivered but that could not be parsed. */
  rejected?: RejectedRecord[];
}

/**
 * Process Batch Port (Driving Port / Use Case Interface)
 * Never rejects: every per-file failure is folded into the result
 */
export interface ProcessBatchPort {
  execute(command: ProcessBatchCommand): Promise<BatchResultVO>;
}
