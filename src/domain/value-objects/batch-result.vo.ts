/**
 * Batch Result Value Object
 * Aggregate of one batch invocation. Derived, never persisted.
 */
export enum BatchStatus {
  SUCCESS = 'success',
  PARTIAL_FAILURE = 'partial_failure',
  ERROR = 'error',
}

export interface BatchSummary {
  status: BatchStatus;
  processed: number;
  total: number;
  failed: number;
  message?: string;
}

export class BatchResultVO {
  private constructor(
    private readonly _totalCount: number,
    private readonly _succeededKeys: readonly string[],
    private readonly _failedKeys: readonly string[],
    private readonly _configurationError: boolean,
  ) {}

  static fromOutcomes(
    totalCount: number,
    succeededKeys: string[],
    failedKeys: string[],
  ): BatchResultVO {
    if (succeededKeys.length + failedKeys.length !== totalCount) {
      throw new Error(
        `Outcome count mismatch: ${succeededKeys.length} succeeded + ${failedKeys.length} failed != ${totalCount} total`,
      );
    }
    return new BatchResultVO(
      totalCount,
      Object.freeze([...succeededKeys]),
      Object.freeze([...failedKeys]),
      false,
    );
  }

  static configurationError(totalCount: number): BatchResultVO {
    return new BatchResultVO(totalCount, Object.freeze([]), Object.freeze([]), true);
  }

  get totalCount(): number {
    return this._totalCount;
  }

  get succeededCount(): number {
    return this._succeededKeys.length;
  }

  get succeededKeys(): readonly string[] {
    return this._succeededKeys;
  }

  /** Keys of files that did not reach the destination, in event order, then rejected records. */
  get failedKeys(): readonly string[] {
    return this._failedKeys;
  }

  get isConfigurationError(): boolean {
    return this._configurationError;
  }

  get status(): BatchStatus {
    if (this._configurationError) {
      return BatchStatus.ERROR;
    }
    if (this.succeededCount === this._totalCount) {
      return BatchStatus.SUCCESS;
    }
    if (this.succeededCount === 0) {
      return BatchStatus.ERROR;
    }
    return BatchStatus.PARTIAL_FAILURE;
  }

  toSummary(): BatchSummary {
    return {
      status: this.status,
      processed: this.succeededCount,
      total: this._totalCount,
      failed: this._failedKeys.length,
      ...(this._configurationError && { message: 'Configuration retrieval failed' }),
    };
  }
}
