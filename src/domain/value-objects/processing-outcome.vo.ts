/**
 * Processing Outcome
 *
 * RELOCATED  - verified clean, uploaded to the destination and removed from source
 * DISCARDED  - rejected by validation, stripping or verification; source deleted
 * FAILED     - an unexpected error prevented a clean outcome; source state is best-effort
 */
export enum ProcessingOutcome {
  RELOCATED = 'RELOCATED',
  DISCARDED = 'DISCARDED',
  FAILED = 'FAILED',
}

/**
 * Per-file pipeline states, in order along the success path.
 */
export enum FileProcessingState {
  RECEIVED = 'RECEIVED',
  DOWNLOADED = 'DOWNLOADED',
  CLASSIFIED = 'CLASSIFIED',
  STRIPPED = 'STRIPPED',
  VERIFIED = 'VERIFIED',
  RELOCATED = 'RELOCATED',
}

export function isSuccessfulOutcome(outcome: ProcessingOutcome): boolean {
  return outcome === ProcessingOutcome.RELOCATED;
}
