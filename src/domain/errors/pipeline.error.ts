/**
 * Pipeline error taxonomy.
 *
 * Each FileProcessor step returns a `StepResult`; the per-file state
 * machine branches on `error.kind` instead of catching exceptions wholesale.
 */
export enum PipelineErrorKind {
  CONFIG = 'CONFIG',
  SIZE_REJECTION = 'SIZE_REJECTION',
  CLASSIFICATION_REJECTION = 'CLASSIFICATION_REJECTION',
  TRANSFORM_FAILURE = 'TRANSFORM_FAILURE',
  TRANSPORT_FAILURE = 'TRANSPORT_FAILURE',
  UNEXPECTED = 'UNEXPECTED',
}

export class PipelineError extends Error {
  constructor(
    public readonly kind: PipelineErrorKind,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

export enum StripFailureReason {
  ACCESS_FAILURE = 'ACCESS_FAILURE',
  ENCODING_FAILURE = 'ENCODING_FAILURE',
}

export class MetadataStripError extends Error {
  constructor(
    public readonly reason: StripFailureReason,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'MetadataStripError';
  }
}

export type StepResult<T = void> =
  | { ok: true; value: T }
  | { ok: false; error: PipelineError };

export function ok<T>(value: T): StepResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  kind: PipelineErrorKind,
  message: string,
  cause?: unknown,
): StepResult<T> {
  return { ok: false, error: new PipelineError(kind, message, cause) };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
