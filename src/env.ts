import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from './errors';

const booleanString = z
  .union([z.enum(['true', 'false']), z.undefined()])
  .transform((value) => value === 'true');

const schema = z
  .object({
    AWS_REGION: z.string().min(1).default('us-east-1'),
    AWS_ACCESS_KEY_ID: z.string().min(1).optional(),
    AWS_SECRET_ACCESS_KEY: z.string().min(1).optional(),
    // S3/SQS compatible endpoint (localstack, minio...)
    AWS_ENDPOINT: z.string().url().optional(),

    TRANSCODE_INPUT_BUCKET: z.string().min(1, 'TRANSCODE_INPUT_BUCKET is required'),
    TRANSCODE_OUTPUT_BUCKET: z.string().min(1, 'TRANSCODE_OUTPUT_BUCKET is required'),
    TRANSCODE_PIPELINE_ID: z.string().min(1, 'TRANSCODE_PIPELINE_ID is required'),
    TRANSCODE_PRESET_ID: z.string().min(1, 'TRANSCODE_PRESET_ID is required'),
    TRANSCODE_NOTIFICATION_QUEUE_URL: z.string().url(),
    // 0 waits forever
    TRANSCODE_WAIT_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(60 * 60 * 1000),
    TRANSCODE_STRICT_CLEANUP: booleanString,

    SQS_WAIT_TIME_SECONDS: z.coerce.number().int().min(0).max(20).default(20),
    SQS_MAX_MESSAGES: z.coerce.number().int().min(1).max(10).default(10),

    REDIS_URL: z.string().min(1, 'REDIS_URL is required'),
    QUEUE_NAME: z.string().default('media-transcode'),
    WORKER_CONCURRENCY: z.coerce.number().int().positive().default(1),
    // true forks one process per worker; WORKER_COUNT defaults to the CPU count
    WORKER_CLUSTER: booleanString,
    WORKER_COUNT: z.coerce.number().int().positive().optional(),
    OUTPUT_DIR: z.string().min(1).default('./transcoded'),

    // Optional callback to backend to report results
    BACKEND_API_URL: z.string().url().optional(),
    BACKEND_API_TOKEN: z.string().optional(),
    CALLBACK_MAX_RETRIES: z.coerce.number().int().positive().default(5),
  })
  .superRefine((data, ctx) => {
    if (Boolean(data.AWS_ACCESS_KEY_ID) !== Boolean(data.AWS_SECRET_ACCESS_KEY)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY must be set together',
        path: ['AWS_ACCESS_KEY_ID'],
      });
    }
  });

export type Env = z.infer<typeof schema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = schema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
    throw new ConfigError(`Invalid environment configuration. Fix the following: ${issues.join('; ')}`);
  }
  return parsed.data;
}

let cached: Env | null = null;

export function getEnv(): Env {
  if (cached) return cached;
  cached = loadEnv();
  return cached;
}
