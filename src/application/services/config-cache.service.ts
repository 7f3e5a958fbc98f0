import { Inject, Injectable, Logger } from '@nestjs/common';
import { PIPELINE_SETTINGS } from '../../config/config.module';
import { PipelineSettings } from '../../config/configuration';
import { PipelineConfigVO } from '../../domain/value-objects/pipeline-config.vo';
import {
  PipelineErrorKind,
  StepResult,
  errorMessage,
  fail,
  ok,
} from '../../domain/errors/pipeline.error';
import { FileStoragePort } from '../ports/output/file-storage.port';
import { ParameterStorePort } from '../ports/output/parameter-store.port';
import {
  FILE_STORAGE_PORT,
  PARAMETER_STORE_PORT,
} from '../ports/output/injection-tokens';

export const DEFAULT_MAX_FILE_SIZE_BYTES = 10 * 1024 * 1024; // 10 MiB

const INTEGER_PATTERN = /^[+-]?\d+$/;

export interface PipelineParameterNames {
  ingestBucket: string;
  processedBucket: string;
  processedKmsKeyArn: string;
  maxFileSize: string;
}

export function buildParameterNames(projectName: string): PipelineParameterNames {
  return {
    ingestBucket: `/${projectName}/ingest-bucket`,
    processedBucket: `/${projectName}/processed-bucket`,
    processedKmsKeyArn: `/${projectName}/processed-kms-key-arn`,
    maxFileSize: `/${projectName}/max-file-size`,
  };
}

/**
 * Parse the size-limit parameter. Anything that is not a positive integer
 * falls back to the default instead of failing the fetch.
 */
export function parseMaxFileSize(raw: string | undefined): number | null {
  const trimmed = raw?.trim();
  if (!trimmed || !INTEGER_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isSafeInteger(value) && value > 0 ? value : null;
}

/**
 * Config Cache
 *
 * Owns the current `PipelineConfigVO` and refreshes it from Parameter Store
 * once it is older than the configured TTL. Refreshes are single-writer:
 * callers arriving while a fetch is in flight await the same promise.
 *
 * A failed fetch never falls back to a previous value. Expired entries are
 * cleared as soon as expiry is detected.
 */
@Injectable()
export class ConfigCacheService {
  private readonly logger = new Logger(ConfigCacheService.name);
  private readonly ttlMs: number;
  private readonly parameterNames: PipelineParameterNames;

  private cached: PipelineConfigVO | null = null;
  private refreshInFlight: Promise<StepResult<PipelineConfigVO>> | null = null;
  private generation = 0;

  constructor(
    @Inject(PARAMETER_STORE_PORT) private readonly parameterStore: ParameterStorePort,
    @Inject(FILE_STORAGE_PORT) private readonly fileStorage: FileStoragePort,
    @Inject(PIPELINE_SETTINGS) settings: PipelineSettings,
  ) {
    this.ttlMs = settings.configCacheTtlSeconds * 1000;
    this.parameterNames = buildParameterNames(settings.projectName);
  }

  async get(): Promise<StepResult<PipelineConfigVO>> {
    const cached = this.cached;

    if (cached) {
      const ageMs = cached.ageMs();
      if (ageMs < this.ttlMs) {
        this.logger.debug(`Using cached config (age: ${(ageMs / 1000).toFixed(1)}s)`);
        return ok(cached);
      }

      this.logger.log(`Invalidating stale config cache (age: ${(ageMs / 1000).toFixed(1)}s)`);
      this.cached = null;
    }

    if (!this.refreshInFlight) {
      const refresh: Promise<StepResult<PipelineConfigVO>> = this.refresh().finally(() => {
        if (this.refreshInFlight === refresh) {
          this.refreshInFlight = null;
        }
      });
      this.refreshInFlight = refresh;
    }

    return this.refreshInFlight;
  }

  /**
   * Drops the cached value. A refresh already in flight still answers its
   * callers but no longer populates the cache.
   */
  invalidate(): void {
    this.generation++;
    this.cached = null;
    this.refreshInFlight = null;
  }

  private async refresh(): Promise<StepResult<PipelineConfigVO>> {
    const generation = this.generation;
    const names = this.parameterNames;
    const expected = Object.values(names);

    let params: Record<string, string>;
    try {
      params = await this.parameterStore.getParameters(expected);
    } catch (error) {
      return this.unavailable(
        `Failed to fetch parameters from Parameter Store: ${errorMessage(error)}`,
        error,
      );
    }

    const received = Object.keys(params).length;
    if (received !== expected.length) {
      return this.unavailable(`Expected ${expected.length} parameters, got ${received}`);
    }

    const sourceLocation = params[names.ingestBucket] ?? '';
    const destinationLocation = params[names.processedBucket] ?? '';

    for (const [label, bucket] of [
      ['ingest-bucket', sourceLocation],
      ['processed-bucket', destinationLocation],
    ]) {
      if (bucket.trim().length === 0) {
        return this.unavailable(`Invalid ${label}: must be a non-empty string`);
      }

      let exists: boolean;
      try {
        exists = await this.fileStorage.bucketExists(bucket);
      } catch (error) {
        return this.unavailable(
          `${label} '${bucket}' could not be checked: ${errorMessage(error)}`,
          error,
        );
      }

      if (!exists) {
        return this.unavailable(`${label} '${bucket}' does not exist or access denied`);
      }
    }

    const destinationEncryptionKeyRef = params[names.processedKmsKeyArn] ?? '';
    if (destinationEncryptionKeyRef.trim().length === 0) {
      return this.unavailable('processed-kms-key-arn is required');
    }

    let maxFileSizeBytes = parseMaxFileSize(params[names.maxFileSize]);
    if (maxFileSizeBytes === null) {
      this.logger.warn(
        `Invalid max-file-size '${params[names.maxFileSize]}' in Parameter Store, using default ${DEFAULT_MAX_FILE_SIZE_BYTES}`,
      );
      maxFileSizeBytes = DEFAULT_MAX_FILE_SIZE_BYTES;
    }

    let config: PipelineConfigVO;
    try {
      config = PipelineConfigVO.create({
        sourceLocation,
        destinationLocation,
        maxFileSizeBytes,
        destinationEncryptionKeyRef,
        fetchedAt: new Date(),
      });
    } catch (error) {
      return this.unavailable(`Invalid pipeline config: ${errorMessage(error)}`, error);
    }

    if (generation !== this.generation) {
      this.logger.debug('Config cache invalidated during refresh, not storing result');
      return ok(config);
    }

    this.cached = config;
    this.logger.log('Fetched fresh config from Parameter Store');

    return ok(config);
  }

  private unavailable(message: string, cause?: unknown): StepResult<PipelineConfigVO> {
    this.logger.error(message);
    return fail(PipelineErrorKind.CONFIG, message, cause);
  }
}
