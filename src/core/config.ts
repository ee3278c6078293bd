/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * Every setting the service reads (listen address, deployment metadata, JWT
 * signing material, metrics switches) is funnelled through this file, so other
 * modules import `config` instead of touching process.env.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema validates and coerces
 * the values at startup. Anything missing or malformed stops the process with
 * the full issue tree printed. The result is a nested, read-only `config`
 * object; nothing here changes after boot.
 */
import 'dotenv/config';

import { z } from 'zod/v4';

/** `z.coerce.boolean()` turns the string "false" into true, so flags are parsed explicitly. */
const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  /** Reported by /, /version and /health. */
  APP_VERSION: z.string().min(1).default('1.0.0'),
  APP_ENVIRONMENT: z.string().min(1).default('development'),
  /** Colour of this deployment in a blue/green rollout. */
  DEPLOYMENT_VERSION: z.string().min(1).default('blue'),

  SECRET_KEY: z.string().min(1).default('your-secret-key-change-this-in-production'),
  JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().positive().default(30),
  /** bcrypt cost used when the in-memory directory is seeded. */
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(31).default(12),

  /** Also export Node process metrics (heap, event loop lag, GC) on /metrics. */
  METRICS_COLLECT_DEFAULTS: booleanFlag.default(true),

  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().min(0).default(10_000),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  port: env.PORT,
  host: env.HOST,
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  log: {
    level: env.LOG_LEVEL,
  },

  app: {
    version: env.APP_VERSION,
    environment: env.APP_ENVIRONMENT,
    deploymentVersion: env.DEPLOYMENT_VERSION,
  },

  auth: {
    secret: env.SECRET_KEY,
    algorithm: env.JWT_ALGORITHM,
    accessTokenTtlMinutes: env.ACCESS_TOKEN_EXPIRE_MINUTES,
    bcryptRounds: env.BCRYPT_ROUNDS,
  },

  metrics: {
    collectDefaults: env.METRICS_COLLECT_DEFAULTS,
  },

  shutdown: {
    timeoutMs: env.SHUTDOWN_TIMEOUT_MS,
  },
} as const;

export type AppConfig = typeof config;
export type AuthConfig = AppConfig['auth'];
export type AppInfo = AppConfig['app'];
