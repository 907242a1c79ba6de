/**
 * @file src/config.ts
 * @description Builds the typed `ServerConfig` from environment variables. All parsing
 * and defaulting goes through a single Zod schema so that a bad value fails startup
 * with every problem listed at once.
 */

import { z } from 'zod';
import { ConfigurationError } from './types.js';
import type { ServerConfig } from './types.js';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  PORT: positiveInt(1453),
  CORS_ORIGIN: z.string().default('*'),
  ALLOWED_HOSTS: z
    .string()
    .default('')
    .transform((value) =>
      value
        .split(',')
        .map((host) => host.trim())
        .filter((host) => host !== ''),
    ),
  USE_REDIS: booleanFlag,
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  RATE_LIMIT_WINDOW: positiveInt(900_000), // 15 minutes
  RATE_LIMIT_MAX: positiveInt(1000),
  SERVER_NAME: z.string().min(1).default('mcp-session-gateway'),
  SESSION_TTL_SECONDS: positiveInt(3600),
  SESSION_GRACE_SECONDS: positiveInt(300),
  SESSION_REUSE_WINDOW_SECONDS: z.coerce.number().int().nonnegative().default(300),
  RECOVERY_MAX_ATTEMPTS: positiveInt(3),
  RECOVERY_COOLDOWN_SECONDS: positiveInt(300),
  RECOVERY_SWEEP_INTERVAL_MS: positiveInt(3_600_000), // hourly
  DISCOVERY_ENABLED: booleanFlag,
  DISCOVERY_MAX_TRACKED: positiveInt(10_000),
  VIRUSTOTAL_API_KEY: optionalSecret,
  DATABASE_URL: optionalSecret,
});

/**
 * @summary Parses environment variables into a `ServerConfig`.
 * @param env Defaults to `process.env`; tests pass a plain object.
 * @throws {ConfigurationError} If any variable fails validation.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    corsOrigin: values.CORS_ORIGIN,
    allowedHosts: values.ALLOWED_HOSTS,
    useRedis: values.USE_REDIS,
    redisUrl: values.REDIS_URL,
    logLevel: values.LOG_LEVEL,
    rateLimit: {
      windowMs: values.RATE_LIMIT_WINDOW,
      max: values.RATE_LIMIT_MAX,
    },
    serverName: values.SERVER_NAME,
    sessions: {
      ttlSeconds: values.SESSION_TTL_SECONDS,
      graceSeconds: values.SESSION_GRACE_SECONDS,
      reuseWindowSeconds: values.SESSION_REUSE_WINDOW_SECONDS,
    },
    recovery: {
      maxAttempts: values.RECOVERY_MAX_ATTEMPTS,
      cooldownSeconds: values.RECOVERY_COOLDOWN_SECONDS,
      sweepIntervalMs: values.RECOVERY_SWEEP_INTERVAL_MS,
    },
    discovery: {
      enabled: values.DISCOVERY_ENABLED,
      maxTracked: values.DISCOVERY_MAX_TRACKED,
    },
    tools: {
      virustotalApiKey: values.VIRUSTOTAL_API_KEY,
      databaseUrl: values.DATABASE_URL,
    },
  };
}
