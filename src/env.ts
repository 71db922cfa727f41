import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));

const ratio = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().min(0).max(1).default(fallback));

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive(),
    LOG_LEVEL: z.preprocess(
      emptyToUndefined,
      z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    ),

    STATE_STORE: z.preprocess(emptyToUndefined, z.enum(['redis', 'memory']).default('redis')),
    REDIS_URL: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
    STORE_COMMAND_TIMEOUT_MS: positiveInt(2000),

    SESSION_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('call_session')),
    SESSION_TTL_SECONDS: positiveInt(48 * 60 * 60),
    SESSION_MAX_AGE_SECONDS: positiveInt(7 * 24 * 60 * 60),

    RATE_LIMIT_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('rate_limit')),
    RATE_LIMIT_WINDOW_SECONDS: positiveInt(24 * 60 * 60),
    RATE_LIMIT_MAX_CALLS: positiveInt(3),
    IDENTITY_HASH_SECRET: z.preprocess(emptyToUndefined, z.string().min(1).optional()),

    BRAIN_URL: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
    BRAIN_TIMEOUT_MS: positiveInt(8000),
    HISTORY_WINDOW: positiveInt(6),

    FIELD_CONFIDENCE_THRESHOLD: ratio(0.5),
    COMPLETION_THRESHOLD: ratio(0.8),
    REQUIRED_FIELDS_WEIGHT: ratio(0.7),
    OPTIONAL_FIELDS_WEIGHT: ratio(0.3),
    MAX_TURNS: positiveInt(40),
    ADVERSARIAL_TERMINATE_SCORE: positiveInt(60),

    GAP_MINOR_MAX_YEARS: positiveInt(1),
    GAP_MODERATE_MAX_YEARS: positiveInt(3),
    GAP_MAJOR_MAX_YEARS: positiveInt(10),

    WEBHOOK_DESTINATION_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
    WEBHOOK_SIGNING_SECRET: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
    WEBHOOK_TIMEOUT_MS: positiveInt(30_000),

    OUTBOX_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('outbox')),
    OUTBOX_TTL_SECONDS: positiveInt(7 * 24 * 60 * 60),
    OUTBOX_MAX_RETRIES: positiveInt(5),
    OUTBOX_INITIAL_DELAY_SECONDS: positiveInt(60),
    OUTBOX_BACKOFF_MULTIPLIER: z.preprocess(emptyToUndefined, z.coerce.number().min(1).default(2)),
    OUTBOX_MAX_DELAY_SECONDS: positiveInt(3600),
    OUTBOX_BATCH_SIZE: positiveInt(10),
    OUTBOX_POLL_INTERVAL_MS: positiveInt(30_000),
    OUTBOX_LEASE_MS: positiveInt(120_000),

    CALL_QUEUE_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('call_queue')),
    CALL_QUEUE_TTL_SECONDS: positiveInt(7 * 24 * 60 * 60),
    CALL_QUEUE_MAX_ATTEMPTS: positiveInt(3),
    CALL_QUEUE_RETRY_DELAY_SECONDS: positiveInt(30 * 60),
    CALL_QUEUE_STALL_SECONDS: positiveInt(48 * 60 * 60),
    CALL_QUEUE_SCAN_LIMIT: positiveInt(50),
  })
  .superRefine((value, ctx) => {
    if (value.STATE_STORE === 'redis' && !value.REDIS_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'REDIS_URL is required when STATE_STORE=redis',
        path: ['REDIS_URL'],
      });
    }
    if (!(value.GAP_MINOR_MAX_YEARS < value.GAP_MODERATE_MAX_YEARS
      && value.GAP_MODERATE_MAX_YEARS < value.GAP_MAJOR_MAX_YEARS)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'gap severity thresholds must be strictly increasing',
        path: ['GAP_MODERATE_MAX_YEARS'],
      });
    }
  });

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join(', ');
  throw new Error(`Invalid environment variables: ${issues}`);
}

export const env = parsed.data;

export type Env = typeof env;
