import { userInfo } from 'node:os';
import { z } from 'zod';
import { ConfigurationError, formatIssues } from '@batchrun/shared';

/** AWS Batch rejects describe-jobs calls with more ids than this. */
export const DESCRIBE_JOBS_LIMIT = 100;

const positiveInt = (name: string, fallback: number) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be greater than 0`)
    .default(fallback);

const envSchema = z.object({
  AWS_REGION: z.string().min(1).optional(),
  BATCHRUN_JOB_NAME_PREFIX: z
    .string()
    .regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, 'BATCHRUN_JOB_NAME_PREFIX must start alphanumeric and contain only letters, numbers, hyphens and underscores')
    .max(32, 'BATCHRUN_JOB_NAME_PREFIX must be at most 32 characters')
    .default('batchrun'),
  BATCHRUN_MAX_CONCURRENCY: positiveInt('BATCHRUN_MAX_CONCURRENCY', 50),
  BATCHRUN_API_MAX_ATTEMPTS: positiveInt('BATCHRUN_API_MAX_ATTEMPTS', 50),
  BATCHRUN_MAX_SOCKETS: positiveInt('BATCHRUN_MAX_SOCKETS', 25),
  BATCHRUN_DESCRIBE_BATCH_SIZE: positiveInt('BATCHRUN_DESCRIBE_BATCH_SIZE', 50).refine(
    (value) => value <= DESCRIBE_JOBS_LIMIT,
    { message: `BATCHRUN_DESCRIBE_BATCH_SIZE cannot exceed ${DESCRIBE_JOBS_LIMIT}` },
  ),
  BATCHRUN_LOG_GROUP: z.string().min(1).default('/aws/batch/job'),
  BATCHRUN_LOG_FETCH_ATTEMPTS: z.coerce
    .number({ invalid_type_error: 'BATCHRUN_LOG_FETCH_ATTEMPTS must be a number' })
    .int()
    .nonnegative('BATCHRUN_LOG_FETCH_ATTEMPTS cannot be negative')
    .default(3),
  BATCHRUN_LOG_FETCH_DELAY_MS: z.coerce
    .number({ invalid_type_error: 'BATCHRUN_LOG_FETCH_DELAY_MS must be a number' })
    .int()
    .nonnegative('BATCHRUN_LOG_FETCH_DELAY_MS cannot be negative')
    .default(0),
  BATCHRUN_JOB_ROLE_ARN: z.string().min(1).optional(),
  BATCHRUN_USER: z.string().min(1).optional(),
});

export interface DriverConfig {
  region?: string;
  jobNamePrefix: string;
  maxConcurrency: number;
  apiMaxAttempts: number;
  maxSockets: number;
  describeBatchSize: number;
  logGroup: string;
  logFetchAttempts: number;
  logFetchDelayMs: number;
  jobRoleArn?: string;
  user: string;
}

function currentUser(): string {
  try {
    return userInfo().username;
  } catch {
    return process.env.USER ?? 'unknown';
  }
}

export function loadDriverConfig(env: NodeJS.ProcessEnv = process.env): Readonly<DriverConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid driver configuration. Fix the following: ${formatIssues(parsed.error)}`,
    );
  }
  const e = parsed.data;

  return Object.freeze({
    region: e.AWS_REGION,
    jobNamePrefix: e.BATCHRUN_JOB_NAME_PREFIX,
    maxConcurrency: e.BATCHRUN_MAX_CONCURRENCY,
    apiMaxAttempts: e.BATCHRUN_API_MAX_ATTEMPTS,
    maxSockets: e.BATCHRUN_MAX_SOCKETS,
    describeBatchSize: e.BATCHRUN_DESCRIBE_BATCH_SIZE,
    logGroup: e.BATCHRUN_LOG_GROUP,
    logFetchAttempts: e.BATCHRUN_LOG_FETCH_ATTEMPTS,
    logFetchDelayMs: e.BATCHRUN_LOG_FETCH_DELAY_MS,
    jobRoleArn: e.BATCHRUN_JOB_ROLE_ARN,
    user: e.BATCHRUN_USER ?? currentUser(),
  });
}
