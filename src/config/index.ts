/**
 * Configuration
 *
 * Reads storage settings from the environment and builds the matching
 * backend. Every variable is optional except DATABASE_URL under postgres.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';

import type { StorageBackend } from '../storage/backend';
import { MemoryBackend } from '../storage/memoryBackend';
import { DEFAULT_MAX_POOL_SIZE, DEFAULT_MIN_POOL_SIZE, PostgresBackend } from '../storage/postgresBackend';
import { SqliteBackend } from '../storage/sqliteBackend';
import type { Logger } from '../utils/logger';
import { parseInput } from '../utils/validation';

export const DEFAULT_DB_PATH = join(homedir(), '.dmo', 'dmo.db');

export interface PostgresConfig {
  databaseUrl: string;
  minPoolSize: number;
  maxPoolSize: number;
  acquireTimeoutMs: number;
}

export type DmoConfig =
  | { backend: 'memory' }
  | { backend: 'sqlite'; dbPath: string }
  | ({ backend: 'postgres' } & PostgresConfig);

const blankToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const envSchema = z
  .object({
    STORAGE_BACKEND: z.preprocess(
      (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
      z.enum(['memory', 'sqlite', 'postgres']).default('sqlite')
    ),
    DMO_DB_PATH: z.preprocess(blankToUndefined, z.string().default(DEFAULT_DB_PATH)),
    DATABASE_URL: z.preprocess(blankToUndefined, z.string().optional()),
    DMO_PG_POOL_MIN: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(DEFAULT_MIN_POOL_SIZE)),
    DMO_PG_POOL_MAX: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).default(DEFAULT_MAX_POOL_SIZE)),
    DMO_PG_ACQUIRE_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(0)),
  })
  .superRefine((env, ctx) => {
    if (env.DMO_PG_POOL_MAX < env.DMO_PG_POOL_MIN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DMO_PG_POOL_MAX'],
        message: 'must be greater than or equal to DMO_PG_POOL_MIN',
      });
    }
    if (env.STORAGE_BACKEND === 'postgres' && env.DATABASE_URL === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'is required when STORAGE_BACKEND is postgres',
      });
    }
  });

/**
 * Parse storage settings.
 * @throws DmoError of kind `validation` when a variable is malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DmoConfig {
  const parsed = parseInput(envSchema, env);

  switch (parsed.STORAGE_BACKEND) {
    case 'memory':
      return { backend: 'memory' };
    case 'sqlite':
      return { backend: 'sqlite', dbPath: parsed.DMO_DB_PATH };
    case 'postgres':
      return {
        backend: 'postgres',
        databaseUrl: parsed.DATABASE_URL ?? '',
        minPoolSize: parsed.DMO_PG_POOL_MIN,
        maxPoolSize: parsed.DMO_PG_POOL_MAX,
        acquireTimeoutMs: parsed.DMO_PG_ACQUIRE_TIMEOUT_MS,
      };
  }
}

/**
 * Build (but do not initialize) the backend a config names.
 */
export function createBackend(config: DmoConfig, logger?: Logger): StorageBackend {
  switch (config.backend) {
    case 'memory':
      return new MemoryBackend({ logger });
    case 'sqlite':
      return new SqliteBackend({ dbPath: config.dbPath, logger });
    case 'postgres':
      return new PostgresBackend({
        connectionString: config.databaseUrl,
        minPoolSize: config.minPoolSize,
        maxPoolSize: config.maxPoolSize,
        acquireTimeoutMs: config.acquireTimeoutMs,
        logger,
      });
  }
}
