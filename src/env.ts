import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const stringToBoolean = (value: unknown): unknown => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '') {
      return undefined;
    }
    if (normalized === 'true') {
      return true;
    }
    if (normalized === 'false') {
      return false;
    }
  }
  return value;
};

const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));

const optionalString = () => z.preprocess(emptyToUndefined, z.string().min(1).optional());

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive(),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),
  DISPATCH_RULES_PATH: z.string().min(1),

  ROOM_CREATE_TIMEOUT_MS: positiveInt(10_000),
  AGENT_START_TIMEOUT_MS: positiveInt(15_000),
  TEARDOWN_TIMEOUT_MS: positiveInt(5_000),
  SESSION_GRACE_MS: positiveInt(60_000),
  MAX_SESSION_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().optional()),

  TELNYX_API_KEY: z.string().min(1),
  TELNYX_PUBLIC_KEY: optionalString(),
  TELNYX_WEBHOOK_SECRET: optionalString(),
  TELNYX_SKIP_SIGNATURE: z.preprocess(stringToBoolean, z.boolean().default(false)),

  LIVEKIT_URL: z.string().min(1),
  LIVEKIT_API_KEY: z.string().min(1),
  LIVEKIT_API_SECRET: z.string().min(1),
  LIVEKIT_ROOM_EMPTY_TIMEOUT_S: positiveInt(300),
  LIVEKIT_SKIP_SIGNATURE: z.preprocess(stringToBoolean, z.boolean().default(false)),
  AGENT_IDENTITY_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('agent-')),

  REDIS_URL: optionalString(),
  GLOBAL_CONCURRENCY_CAP: positiveInt(50),
  TRUNK_CONCURRENCY_CAP_DEFAULT: positiveInt(20),
  TRUNK_CALLS_PER_MIN_CAP_DEFAULT: positiveInt(60),
  CAPACITY_TTL_SECONDS: positiveInt(3_600),
  CAPACITY_TIMEOUT_MS: positiveInt(1_500),
  CAP_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('cap')),

  ADMIN_TOKEN: optionalString(),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment variables: ${issues}`);
  }

  return parsed.data;
}

export const env = parseEnv(process.env);
