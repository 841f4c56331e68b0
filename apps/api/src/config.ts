/**
 * API configuration
 *
 * Parsed once from the environment at start-up; invalid values fail fast.
 */

import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/** Allow-list entry meaning "any address" */
export const ANY_IP = '0.0.0.0';

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    DATABASE_URL: z.string().url().optional(),
    DATABASE_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),
    CACHE_TTL_SECONDS: z.coerce.number().int().min(1).default(300),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    ADMIN_API_KEY: z.string().min(1).optional(),
    ADMIN_ALLOWED_IPS: z.string().default(ANY_IP),
    WEB_APP_URL: z.string().url().default('http://localhost:5173'),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV !== 'production') {
      return;
    }
    if (!env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required in production',
      });
    }
    if (!env.ADMIN_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ADMIN_API_KEY'],
        message: 'ADMIN_API_KEY is required in production',
      });
    }
  });

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ApiConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  databaseUrl: string;
  databasePoolMax: number;
  cacheTtlMs: number;
  logLevel: LogLevel;
  /** Unset means the admin surface is open (development and test only) */
  adminApiKey?: string;
  adminAllowedIps: string[];
  webAppUrl: string;
}

export class ConfigurationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    env: values.NODE_ENV,
    port: values.PORT,
    databaseUrl: values.DATABASE_URL ?? 'postgresql://localhost:5432/eurocoin',
    databasePoolMax: values.DATABASE_POOL_MAX,
    cacheTtlMs: values.CACHE_TTL_SECONDS * 1000,
    logLevel: values.LOG_LEVEL,
    adminApiKey: values.ADMIN_API_KEY,
    adminAllowedIps: values.ADMIN_ALLOWED_IPS.split(',')
      .map((ip) => ip.trim())
      .filter((ip) => ip !== ''),
    webAppUrl: values.WEB_APP_URL,
  };
}
