/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * Every setting the service reads (port, DB credentials, pool bounds, ingest
 * batch size) goes through this file. Other modules import `config` and never
 * touch process.env themselves.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema coerces and validates
 * it at startup ("5432" → 5432). Anything missing or invalid stops the process
 * with the list of issues. The result is a nested `config` object exported with
 * `as const`.
 */
import 'dotenv/config';

import { z } from 'zod/v4';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(5000),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),

    /** Worker processes to fork; 0 means one per CPU core. */
    WEB_CONCURRENCY: z.coerce.number().int().min(0).default(0),

    DB_HOST: z.string().min(1).default('localhost'),
    DB_PORT: z.coerce.number().int().positive().default(5432),
    DB_NAME: z.string().min(1).default('postgres'),
    DB_USER: z.string().min(1).default('postgres'),
    DB_PASSWORD: z.string().default(''),
    DB_SSL: booleanFlag,

    DB_POOL_MIN: z.coerce.number().int().min(0).default(2),
    DB_POOL_MAX: z.coerce.number().int().min(1).default(10),
    /** How long acquire() waits for a free connection before PoolExhausted. */
    DB_ACQUIRE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    DB_IDLE_TIMEOUT_MS: z.coerce.number().int().min(0).default(30_000),
    /** Server-side statement timeout; 0 disables it. */
    DB_STATEMENT_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),

    INGEST_BATCH_SIZE: z.coerce.number().int().min(1).max(5000).default(1000),
    INGEST_DATA_DIR: z.string().default('./data'),
  })
  .refine((env) => env.DB_POOL_MIN <= env.DB_POOL_MAX, {
    message: 'DB_POOL_MIN must not exceed DB_POOL_MAX',
    path: ['DB_POOL_MIN'],
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
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  database: {
    host: env.DB_HOST,
    port: env.DB_PORT,
    name: env.DB_NAME,
    user: env.DB_USER,
    password: env.DB_PASSWORD,
    ssl: env.DB_SSL,
    pool: {
      min: env.DB_POOL_MIN,
      max: env.DB_POOL_MAX,
      acquireTimeoutMs: env.DB_ACQUIRE_TIMEOUT_MS,
      idleTimeoutMs: env.DB_IDLE_TIMEOUT_MS,
    },
    statementTimeoutMs: env.DB_STATEMENT_TIMEOUT_MS,
  },

  cluster: {
    workers: env.WEB_CONCURRENCY,
  },

  log: {
    level: env.LOG_LEVEL,
  },

  ingest: {
    batchSize: env.INGEST_BATCH_SIZE,
    dataDir: env.INGEST_DATA_DIR,
  },
} as const;

export type AppConfig = typeof config;
export type DatabaseConfig = AppConfig['database'];
