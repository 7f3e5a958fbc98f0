/**
 * Pipeline Config Value Object
 *
 * A validated snapshot of the Parameter Store settings. Instances are
 * frozen; a cache refresh replaces the instance instead of mutating it.
 */
export interface PipelineConfigProps {
  sourceLocation: string;
  destinationLocation: string;
  maxFileSizeBytes: number;
  destinationEncryptionKeyRef: string;
  fetchedAt: Date;
}

export class PipelineConfigVO {
  private readonly _sourceLocation: string;
  private readonly _destinationLocation: string;
  private readonly _maxFileSizeBytes: number;
  private readonly _destinationEncryptionKeyRef: string;
  private readonly _fetchedAt: Date;

  private constructor(props: PipelineConfigProps) {
    this._sourceLocation = props.sourceLocation;
    this._destinationLocation = props.destinationLocation;
    this._maxFileSizeBytes = props.maxFileSizeBytes;
    this._destinationEncryptionKeyRef = props.destinationEncryptionKeyRef;
    this._fetchedAt = new Date(props.fetchedAt.getTime());
    Object.freeze(this);
  }

  static create(props: PipelineConfigProps): PipelineConfigVO {
    PipelineConfigVO.validate(props);
    return new PipelineConfigVO(props);
  }

  private static validate(props: PipelineConfigProps): void {
    if (!props.sourceLocation || props.sourceLocation.trim().length === 0) {
      throw new Error('Source location cannot be empty');
    }

    if (!props.destinationLocation || props.destinationLocation.trim().length === 0) {
      throw new Error('Destination location cannot be empty');
    }

    if (!Number.isSafeInteger(props.maxFileSizeBytes) || props.maxFileSizeBytes <= 0) {
      throw new Error('Max file size must be a positive integer');
    }

    if (
      !props.destinationEncryptionKeyRef ||
      props.destinationEncryptionKeyRef.trim().length === 0
    ) {
      throw new Error('Destination encryption key reference cannot be empty');
    }
  }

  get sourceLocation(): string {
    return this._sourceLocation;
  }

  get destinationLocation(): string {
    return this._destinationLocation;
  }

  get maxFileSizeBytes(): number {
    return this._maxFileSizeBytes;
  }

  get destinationEncryptionKeyRef(): string {
    return this._destinationEncryptionKeyRef;
  }

  get fetchedAt(): Date {
    return new Date(this._fetchedAt.getTime());
  }

  /**
   * Age of this snapshot in milliseconds relative to `now`.
   */
  ageMs(now: number = Date.now()): number {
    return now - this._fetchedAt.getTime();
  }

  toJSON() {
    return {
      sourceLocation: this._sourceLocation,
      destinationLocation: this._destinationLocation,
      maxFileSizeBytes: this._maxFileSizeBytes,
      destinationEncryptionKeyRef: this._destinationEncryptionKeyRef,
      fetchedAt: this._fetchedAt.toISOString(),
    };
  }
}
