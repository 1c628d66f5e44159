/**
 * Configuration Tests
 */

import { createBackend, DEFAULT_DB_PATH, loadConfig } from '../config';
import { DmoError } from '../utils/errors';
import { MemoryBackend } from '../storage/memoryBackend';
import { PostgresBackend } from '../storage/postgresBackend';
import { SqliteBackend } from '../storage/sqliteBackend';

function configError(env: NodeJS.ProcessEnv): DmoError {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof DmoError) return err;
    throw err;
  }
  throw new Error('expected loadConfig to throw');
}

describe('loadConfig', () => {
  it('should default to sqlite under the home directory', () => {
    expect(loadConfig({})).toEqual({ backend: 'sqlite', dbPath: DEFAULT_DB_PATH });
    expect(DEFAULT_DB_PATH.endsWith('dmo.db')).toBe(true);
  });

  it('should read the backend name case-insensitively', () => {
    expect(loadConfig({ STORAGE_BACKEND: 'MEMORY' })).toEqual({ backend: 'memory' });
    expect(loadConfig({ STORAGE_BACKEND: ' Sqlite ', DMO_DB_PATH: '/data/dmo.db' })).toEqual({
      backend: 'sqlite',
      dbPath: '/data/dmo.db',
    });
  });

  it('should treat blank variables as unset', () => {
    expect(loadConfig({ STORAGE_BACKEND: 'sqlite', DMO_DB_PATH: '  ' })).toEqual({
      backend: 'sqlite',
      dbPath: DEFAULT_DB_PATH,
    });
  });

  it('should read postgres settings with pool defaults', () => {
    expect(loadConfig({ STORAGE_BACKEND: 'postgres', DATABASE_URL: 'postgres://localhost/dmo' })).toEqual({
      backend: 'postgres',
      databaseUrl: 'postgres://localhost/dmo',
      minPoolSize: 5,
      maxPoolSize: 20,
      acquireTimeoutMs: 0,
    });

    expect(
      loadConfig({
        STORAGE_BACKEND: 'postgres',
        DATABASE_URL: 'postgres://localhost/dmo',
        DMO_PG_POOL_MIN: '1',
        DMO_PG_POOL_MAX: '3',
        DMO_PG_ACQUIRE_TIMEOUT_MS: '2500',
      })
    ).toMatchObject({ minPoolSize: 1, maxPoolSize: 3, acquireTimeoutMs: 2500 });
  });

  it('should require DATABASE_URL for postgres', () => {
    const err = configError({ STORAGE_BACKEND: 'postgres' });
    expect(err.details).toEqual({
      kind: 'validation',
      issues: [{ path: 'DATABASE_URL', message: 'is required when STORAGE_BACKEND is postgres' }],
    });
  });

  it('should reject a pool minimum above the maximum', () => {
    const err = configError({
      STORAGE_BACKEND: 'postgres',
      DATABASE_URL: 'postgres://localhost/dmo',
      DMO_PG_POOL_MIN: '10',
      DMO_PG_POOL_MAX: '4',
    });
    expect(err.details).toEqual({
      kind: 'validation',
      issues: [{ path: 'DMO_PG_POOL_MAX', message: 'must be greater than or equal to DMO_PG_POOL_MIN' }],
    });
  });

  it('should reject unknown backends and non-numeric pool sizes', () => {
    expect(configError({ STORAGE_BACKEND: 'mongo' }).kind).toBe('validation');
    expect(configError({ DMO_PG_POOL_MAX: 'lots' }).kind).toBe('validation');
  });
});

describe('createBackend', () => {
  it('should build an uninitialized backend of the configured kind', () => {
    expect(createBackend({ backend: 'memory' })).toBeInstanceOf(MemoryBackend);

    const sqlite = createBackend({ backend: 'sqlite', dbPath: '/tmp/dmo-test.db' });
    expect(sqlite).toBeInstanceOf(SqliteBackend);
    expect(sqlite.kind).toBe('sqlite');

    const postgres = createBackend({
      backend: 'postgres',
      databaseUrl: 'postgres://localhost/dmo',
      minPoolSize: 1,
      maxPoolSize: 2,
      acquireTimeoutMs: 100,
    });
    expect(postgres).toBeInstanceOf(PostgresBackend);
    expect(postgres instanceof PostgresBackend && postgres.poolConfig).toEqual({
      connectionString: 'postgres://localhost/dmo',
      min: 1,
      max: 2,
      connectionTimeoutMillis: 100,
    });
  });
});
