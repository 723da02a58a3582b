/**
 * Environment configuration
 *
 * Every setting the sync engine reads is validated here with Zod.
 * Invalid values fail fast with one message per field.
 *
 * USAGE:
 *   const config = loadConfig();            // process.env (+ .env via dotenv)
 *   const config = loadConfig({ ... });     // explicit source (tests)
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '@/lib/errors';

dotenv.config();

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

// ─── Schema ──────────────────────────────────────────────

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  /** Remote system of record */
  API_BASE_URL: z.string().url().default('http://localhost:5001/api'),

  /** Per-call timeout for remote requests */
  REMOTE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  /** IndexedDB database name */
  LOCAL_DB_NAME: z.string().min(1).default('mill-ledger'),

  SYNC_BATCH_SIZE: z.coerce.number().int().min(1).max(500).default(50),
  SYNC_MAX_BATCHES_PER_PASS: z.coerce.number().int().min(1).default(20),
  SYNC_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  SYNC_INTERVAL_MS: z.coerce.number().int().min(1000).default(5 * 60 * 1000),
  SYNC_DEBOUNCE_MS: z.coerce.number().int().min(0).default(2000),
  SYNC_PURGE_AFTER_HOURS: z.coerce.number().min(0).default(24),

  /** Send Create records through the /sync batch endpoints */
  SYNC_USE_BATCH_ENDPOINTS: booleanFlag,
});

export type EnvSource = Record<string, string | undefined>;

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  apiBaseUrl: string;
  remoteTimeoutMs: number;
  localDbName: string;
  sync: SyncConfig;
}

export interface SyncConfig {
  batchSize: number;
  maxBatchesPerPass: number;
  maxRetries: number;
  intervalMs: number;
  debounceMs: number;
  purgeAfterHours: number;
  useBatchEndpoints: boolean;
}

// ─── Loader ──────────────────────────────────────────────

export function loadConfig(source: EnvSource = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigError(issues);
  }

  const env = parsed.data;
  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    apiBaseUrl: env.API_BASE_URL.replace(/\/+$/, ''),
    remoteTimeoutMs: env.REMOTE_TIMEOUT_MS,
    localDbName: env.LOCAL_DB_NAME,
    sync: {
      batchSize: env.SYNC_BATCH_SIZE,
      maxBatchesPerPass: env.SYNC_MAX_BATCHES_PER_PASS,
      maxRetries: env.SYNC_MAX_RETRIES,
      intervalMs: env.SYNC_INTERVAL_MS,
      debounceMs: env.SYNC_DEBOUNCE_MS,
      purgeAfterHours: env.SYNC_PURGE_AFTER_HOURS,
      useBatchEndpoints: env.SYNC_USE_BATCH_ENDPOINTS,
    },
  };
}

/** Defaults with no environment applied. */
export const DEFAULT_SYNC_CONFIG: SyncConfig = loadConfig({}).sync;
