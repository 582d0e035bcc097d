import { z } from 'zod';

const offsetListSchema = z.string().transform((value, ctx) => {
  const parts = value.split(',').map(part => part.trim()).filter(part => part.length > 0);
  const offsets: number[] = [];
  for (const part of parts) {
    const minutes = Number(part);
    if (!Number.isInteger(minutes) || minutes <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid reminder offset: ${part}` });
      return z.NEVER;
    }
    offsets.push(minutes);
  }
  return Array.from(new Set(offsets)).sort((a, b) => b - a);
});

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  DATABASE_URL: z.string().min(1).optional(),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(20),
  ADMIN_API_TOKEN: z.string().min(1).optional(),
  BOOKING_WINDOW_DAYS: z.coerce.number().int().min(1).max(90).default(7),
  MAX_ACTIVE_REQUESTS_PER_DAY: z.coerce.number().int().min(0).default(1),
  REMINDER_OFFSETS_MINUTES: offsetListSchema.default('120,30'),
  REMINDER_POLL_INTERVAL_MS: z.coerce.number().int().min(1000).default(60_000),
  REMINDER_BATCH_SIZE: z.coerce.number().int().min(1).max(500).default(50),
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  isProduction: boolean;
  port: number;
  databaseUrl: string | undefined;
  dbPoolMax: number;
  adminApiToken: string | undefined;
  bookingWindowDays: number;
  /** 0 disables the limit. */
  maxActiveRequestsPerDay: number;
  /** Minutes before the start, largest first. */
  reminderOffsetsMinutes: number[];
  reminderPollIntervalMs: number;
  reminderBatchSize: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment configuration - ${problems}`);
  }

  const e = parsed.data;
  return {
    nodeEnv: e.NODE_ENV,
    isProduction: e.NODE_ENV === 'production',
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    dbPoolMax: e.DB_POOL_MAX,
    adminApiToken: e.ADMIN_API_TOKEN,
    bookingWindowDays: e.BOOKING_WINDOW_DAYS,
    maxActiveRequestsPerDay: e.MAX_ACTIVE_REQUESTS_PER_DAY,
    reminderOffsetsMinutes: e.REMINDER_OFFSETS_MINUTES,
    reminderPollIntervalMs: e.REMINDER_POLL_INTERVAL_MS,
    reminderBatchSize: e.REMINDER_BATCH_SIZE,
  };
}
