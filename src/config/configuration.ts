/**
 * Application Configuration
 *
 * Loads and validates environment variables and exposes them as a typed
 * `AppConfig` through `ConfigService<AppConfig>`.
 *
 * Only process-level settings live here. The pipeline parameters that
 * operators change at runtime (bucket names, size limit, KMS key) are read
 * from Parameter Store by the ConfigCache, under `/<PROJECT_NAME>/`.
 *
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const ttl = this.configService.get('pipeline.configCacheTtlSeconds', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';

export type UploadFailurePolicy = 'discard' | 'retain';

/**
 * Settings consumed by the validation-and-transform pipeline.
 */
export interface PipelineSettings {
  /** Namespace of the Parameter Store entries, e.g. `jpeg-sanitizer`. */
  projectName: string;
  configCacheTtlSeconds: number;
  /** Local directory holding scratch copies while a file is processed. */
  scratchDir: string;
  /**
   * What happens to the ingest object when the upload of a verified file
   * fails. `discard` deletes it (fail-closed), `retain` leaves it in place
   * so a redelivered event can process it again.
   */
  uploadFailurePolicy: UploadFailurePolicy;
}

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  aws: {
    region: string;
    endpoint?: string;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
  sqs: {
    ingestEventsUrl: string;
    batchSize: number;
    waitTimeSeconds: number;
    visibilityTimeout: number;
  };
  pipeline: PipelineSettings;
}

export default (): AppConfig => {
  const env: EnvConfig = validateEnv(process.env);

  const config: AppConfig = {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    aws: {
      region: env.AWS_REGION,
      endpoint: env.AWS_ENDPOINT,
    },
    sqs: {
      ingestEventsUrl: env.SQS_INGEST_EVENTS_URL,
      batchSize: env.SQS_BATCH_SIZE,
      waitTimeSeconds: env.SQS_WAIT_TIME_SECONDS,
      visibilityTimeout: env.SQS_VISIBILITY_TIMEOUT,
    },
    pipeline: {
      projectName: env.PROJECT_NAME,
      configCacheTtlSeconds: env.CONFIG_CACHE_TTL_SECONDS,
      scratchDir: env.SCRATCH_DIR,
      uploadFailurePolicy: env.UPLOAD_FAILURE_POLICY,
    },
  };

  // Add AWS credentials only if explicitly provided
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.aws.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    };
  }

  return config;
};
