import { z } from 'zod';

// Runtime configuration, read from the environment once per process.

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  ATS_MAX_FILE_SIZE_MB: z.coerce.number().positive().default(10),
  ATS_RATE_LIMIT: z.coerce.number().int().positive().default(30),
  ATS_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  NODE_ENV: z.string().optional(),
});

export interface AppConfig {
  maxFileSizeBytes: number;
  rateLimit: { limit: number; windowMs: number };
  logLevel: LogLevel;
  isProduction: boolean;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const data = parsed.data;
  const isProduction = data.NODE_ENV === 'production';
  const defaultLevel: LogLevel = data.NODE_ENV === 'test' ? 'silent' : isProduction ? 'info' : 'debug';

  return {
    maxFileSizeBytes: Math.round(data.ATS_MAX_FILE_SIZE_MB * 1024 * 1024),
    rateLimit: { limit: data.ATS_RATE_LIMIT, windowMs: data.ATS_RATE_LIMIT_WINDOW_MS },
    logLevel: data.LOG_LEVEL ?? defaultLevel,
    isProduction,
  };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
