/**
 * File Event
 * One uploaded object announced by the trigger source. Read-only input.
 */
export interface FileEvent {
  readonly sourceLocation: string;
  readonly objectKey: string;
  /** Byte size declared by the trigger; trusted for the size-limit check. */
  readonly declaredSizeBytes?: number;
}

/**
 * A trigger record that could not be turned into a `FileEvent`.
 * Counted as failed; the object, if any, is left where it is.
 */
export interface RejectedRecord {
  /** Raw key as delivered, or the record's position when it has none. */
  readonly objectKey: string;
  readonly reason: string;
}
