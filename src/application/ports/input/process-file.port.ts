import { FileEvent } from '../../../domain/value-objects/file-event.vo';
import { PipelineConfigVO } from '../../../domain/value-objects/pipeline-config.vo';
import {
  FileProcessingState,
  ProcessingOutcome,
} from '../../../domain/value-objects/processing-outcome.vo';
import { PipelineErrorKind } from '../../../domain/errors/pipeline.error';

/**
 * Process File Command
 */
export interface ProcessFileCommand {
  event: FileEvent;
  config: PipelineConfigVO;
}

/**
 * Process File Result
 */
export interface ProcessFileResult {
  outcome: ProcessingOutcome;
  objectKey: string;
  /** Last state reached before the outcome was decided. */
  finalState: FileProcessingState;
  errorKind?: PipelineErrorKind;
  reason?: string;
  /** Whether the source object was deleted as part of this outcome. */
  sourceDiscarded: boolean;
  processingDurationMs: number;
}

/**
 * Process File Port (Driving Port / Use Case Interface)
 * Runs classify → strip → verify → relocate-or-discard for one object
 */
export interface ProcessFilePort {
  execute(command: ProcessFileCommand): Promise<ProcessFileResult>;
}
