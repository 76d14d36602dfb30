import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './logger';

/**
 * Settings for one gateway process. Built once by `loadConfig` at start-up and
 * passed by reference; nothing below `src/server.ts` reads the environment.
 */
export interface GatewayConfig {
  jwtSecret: string;
  /** jose time span (e.g. "7d"). Unset means issued tokens carry no `exp`. */
  tokenExpiresIn?: string;
  openaiApiKey: string;
  model: string;
  upstreamTimeoutMs: number;
  upstreamMaxRetries: number;
  /** Charged when the upstream response reports no token usage. */
  fallbackCost: number;
  defaultQuota: number;
  cycleDays: number;
  databasePath: string;
  port: number;
  logLevel: LogLevel;
  adminApiKey?: string;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

// Time spans jose accepts for `setExpirationTime`, e.g. "7d" or "12 hours".
const TIME_SPAN =
  /^(\+|-)? ?(\d+|\d+\.\d+) ?(seconds?|secs?|s|minutes?|mins?|m|hours?|hrs?|h|days?|d|weeks?|w|years?|yrs?|y)(?: (ago|from now))?$/i;

const envSchema = z.object({
  SECRET_KEY: z.string().min(1, 'SECRET_KEY is required'),
  TOKEN_EXPIRES_IN: optionalString.refine((value) => value === undefined || TIME_SPAN.test(value), {
    message: 'TOKEN_EXPIRES_IN must be a time span such as "7d" or "12h"',
  }),
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  UPSTREAM_MAX_RETRIES: z.coerce.number().int().nonnegative().default(2),
  FALLBACK_COST: z.coerce.number().nonnegative().default(50),
  DEFAULT_QUOTA: z.coerce.number().positive().default(500),
  CYCLE_DAYS: z.coerce.number().int().positive().default(30),
  DATABASE_PATH: z.string().min(1).default('./gateway.db'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  ADMIN_API_KEY: optionalString,
});

export function loadConfig(env: Record<string, string | undefined>): GatewayConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    jwtSecret: parsed.SECRET_KEY,
    tokenExpiresIn: parsed.TOKEN_EXPIRES_IN,
    openaiApiKey: parsed.OPENAI_API_KEY,
    model: parsed.OPENAI_MODEL,
    upstreamTimeoutMs: parsed.UPSTREAM_TIMEOUT_MS,
    upstreamMaxRetries: parsed.UPSTREAM_MAX_RETRIES,
    fallbackCost: parsed.FALLBACK_COST,
    defaultQuota: parsed.DEFAULT_QUOTA,
    cycleDays: parsed.CYCLE_DAYS,
    databasePath: parsed.DATABASE_PATH,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    adminApiKey: parsed.ADMIN_API_KEY,
  };
}
