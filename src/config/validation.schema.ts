import { tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // AWS
  AWS_REGION: z.string().default('us-east-1'),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  AWS_ENDPOINT: z.string().url().optional(), // For LocalStack

  // SQS
  SQS_INGEST_EVENTS_URL: z.string().url(),
  SQS_BATCH_SIZE: z.coerce.number().int().min(1).max(10).default(10),
  SQS_WAIT_TIME_SECONDS: z.coerce.number().int().min(0).max(20).default(20),
  SQS_VISIBILITY_TIMEOUT: z.coerce.number().int().min(0).max(43200).default(900),

  // Pipeline
  PROJECT_NAME: z
    .string()
    .regex(/^[A-Za-z0-9_.-]+$/, 'must be a valid parameter path segment')
    .default('jpeg-sanitizer'),
  CONFIG_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(300),
  SCRATCH_DIR: z.string().default(join(tmpdir(), 'jpeg-sanitizer')),
  UPLOAD_FAILURE_POLICY: z.enum(['discard', 'retain']).default('discard'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
