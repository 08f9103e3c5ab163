/**
 * CLI Configuration
 * 
 * All configuration loaded from environment variables.
 * Uses sensible defaults for development.
 */

import { config as dotenvConfig } from 'dotenv';
import { homedir } from 'node:os';
import { resolve, dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ValidationError, type Account } from '@cache-mirror/core';
import type { MinioConfig } from '@cache-mirror/upload';

// Get monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

const millis = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().min(0));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Base directory of the file cache and its metadata store
  CACHE_MIRROR_DATA_DIR: z.string().min(1).default(join(homedir(), '.cache-mirror')),

  // Auto update
  RECREATE_CHECK_DELAY_MS: millis('5000'),
  OPEN_QUIRK_WINDOW_MS: millis('10000'),
  OPEN_QUIRK_FILTER: z.enum(['auto', 'on', 'off']).default('auto'),
  DEFERRED_RECHECK_ORDER: z.enum(['fifo', 'per-path']).default('fifo'),

  // Signed-in account
  ACCOUNT_SERVER_URL: z.string().url().optional(),
  ACCOUNT_USERNAME: z.string().min(1).optional(),

  // Upload target
  MINIO_ENDPOINT: z.string().min(1).optional(),
  MINIO_PORT: z.string().default('9000').transform(Number).pipe(z.number().int().min(1).max(65535)),
  MINIO_USE_SSL: z.string().transform((v) => v === 'true').default('false'),
  MINIO_ACCESS_KEY: z.string().optional(),
  MINIO_SECRET_KEY: z.string().optional(),
  MINIO_BUCKET: z.string().min(1).default('cache-mirror'),
});

export interface CliConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  dataDir: string;
  autoUpdate: {
    recreateCheckDelayMs: number;
    openQuirkWindowMs: number;
    openQuirkFilter: 'auto' | 'on' | 'off';
    recheckOrder: 'fifo' | 'per-path';
  };
  account: Account | null;
  minio: MinioConfig | null;
}

/**
 * Validate an environment into the CLI configuration.
 * Throws ValidationError naming the first offending variable.
 */
export function parseConfig(env: NodeJS.ProcessEnv): CliConfig {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const issue = parseResult.error.issues[0];
    const field = issue ? issue.path.join('.') : 'environment';
    throw new ValidationError(field, issue?.message ?? 'invalid configuration');
  }

  const parsed = parseResult.data;

  if ((parsed.ACCOUNT_SERVER_URL === undefined) !== (parsed.ACCOUNT_USERNAME === undefined)) {
    throw new ValidationError(
      'ACCOUNT_USERNAME',
      'ACCOUNT_SERVER_URL and ACCOUNT_USERNAME must be set together'
    );
  }

  const account = parsed.ACCOUNT_SERVER_URL && parsed.ACCOUNT_USERNAME
    ? { serverUrl: parsed.ACCOUNT_SERVER_URL, username: parsed.ACCOUNT_USERNAME }
    : null;

  let minio: MinioConfig | null = null;
  if (parsed.MINIO_ENDPOINT) {
    if (!parsed.MINIO_ACCESS_KEY || !parsed.MINIO_SECRET_KEY) {
      throw new ValidationError('MINIO_ACCESS_KEY', 'MinIO credentials are required with MINIO_ENDPOINT');
    }
    minio = {
      endPoint: parsed.MINIO_ENDPOINT,
      port: parsed.MINIO_PORT,
      useSSL: parsed.MINIO_USE_SSL,
      accessKey: parsed.MINIO_ACCESS_KEY,
      secretKey: parsed.MINIO_SECRET_KEY,
      bucket: parsed.MINIO_BUCKET,
    };
  }

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    dataDir: resolve(parsed.CACHE_MIRROR_DATA_DIR),
    autoUpdate: {
      recreateCheckDelayMs: parsed.RECREATE_CHECK_DELAY_MS,
      openQuirkWindowMs: parsed.OPEN_QUIRK_WINDOW_MS,
      openQuirkFilter: parsed.OPEN_QUIRK_FILTER,
      recheckOrder: parsed.DEFERRED_RECHECK_ORDER,
    },
    account,
    minio,
  };
}

/**
 * Load .env from the monorepo root, then validate process.env
 */
export function loadConfig(): CliConfig {
  dotenvConfig({ path: resolve(monorepoRoot, '.env') });
  return parseConfig(process.env);
}
