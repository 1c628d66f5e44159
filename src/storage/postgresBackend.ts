/**
 * Postgres Storage Backend
 *
 * Networked engine on a bounded `pg` connection pool.
 *
 * Integrity:
 * - UNIQUE(name) and UNIQUE(routine_id, date) are the source of truth;
 *   SQLSTATE 23505 becomes duplicate-name, 23503 becomes routine-not-found
 * - Name and parent pre-checks run before inserts so a rejected write does
 *   not burn a SERIAL value (ids stay in step with the other engines)
 * - Pool acquisition timeouts surface as retryable storage errors
 */

import { Pool, types, type PoolConfig, type QueryResult, type QueryResultRow } from 'pg';

import type {
  Activity,
  ActivityCreate,
  ActivityUpdate,
  CalendarDate,
  CompletionRecord,
  ListRoutinesOptions,
  Routine,
  RoutineCreate,
  RoutineUpdate,
} from '../types';
import {
  activityNotFound,
  duplicateName,
  invalidRange,
  isDmoError,
  routineNotFound,
  storageFailure,
  toStorageError,
  validationFailed,
  type DmoError,
} from '../utils/errors';
import { createLogger, type Logger } from '../utils/logger';
import { withNormalizedName, type StorageBackend } from './backend';
import {
  rowToActivity,
  rowToCompletion,
  rowToCount,
  rowToRoutine,
  type ActivityRow,
  type CompletionRow,
  type CountRow,
  type RoutineRow,
} from './rows';

export const DEFAULT_MIN_POOL_SIZE = 5;
export const DEFAULT_MAX_POOL_SIZE = 20;

const PG_UNIQUE_VIOLATION = '23505';
const PG_FOREIGN_KEY_VIOLATION = '23503';

const SCHEMA: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS routines (
    id SERIAL PRIMARY KEY,
    name TEXT NOT NULL UNIQUE,
    description TEXT,
    active BOOLEAN NOT NULL DEFAULT TRUE,
    timezone TEXT,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  `CREATE TABLE IF NOT EXISTS activities (
    id SERIAL PRIMARY KEY,
    routine_id INTEGER NOT NULL REFERENCES routines(id) ON DELETE CASCADE,
    name TEXT NOT NULL,
    "order" INTEGER NOT NULL DEFAULT 0,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  'CREATE INDEX IF NOT EXISTS idx_activities_routine_id ON activities (routine_id)',
  'CREATE INDEX IF NOT EXISTS idx_activities_order ON activities (routine_id, "order")',
  `CREATE TABLE IF NOT EXISTS completions (
    id SERIAL PRIMARY KEY,
    routine_id INTEGER NOT NULL REFERENCES routines(id) ON DELETE CASCADE,
    "date" DATE NOT NULL,
    completed BOOLEAN NOT NULL,
    note TEXT,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    UNIQUE (routine_id, "date")
  )`,
  'CREATE INDEX IF NOT EXISTS idx_completions_routine_date ON completions (routine_id, "date")',
];

const PG_DATE_OID = 1082;

// Keep DATE as its 'YYYY-MM-DD' text; the default parser builds a local-midnight Date
types.setTypeParser(PG_DATE_OID, (value: string) => value);

export interface PostgresBackendOptions {
  /** Full connection string; wins over the discrete fields */
  connectionString?: string;
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
  minPoolSize?: number;
  maxPoolSize?: number;
  /** Max wait for a pooled connection; 0 waits forever */
  acquireTimeoutMs?: number;
  /** Override pool construction (e.g. an in-process stand-in) */
  poolFactory?: (config: PoolConfig) => Pool;
  logger?: Logger;
}

/** What both a Pool and a checked-out client can do */
interface Queryable {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

function pgErrorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * pg-pool rejects with this message when connectionTimeoutMillis elapses.
 */
export function isPoolTimeout(err: unknown): boolean {
  return err instanceof Error && /timeout exceeded when trying to connect/i.test(err.message);
}

export class PostgresBackend implements StorageBackend {
  readonly kind = 'postgres' as const;

  readonly poolConfig: PoolConfig;
  private readonly poolFactory: (config: PoolConfig) => Pool;
  private readonly log: Logger;
  private pool: Pool | null = null;
  private schemaReady = false;

  constructor(options: PostgresBackendOptions = {}) {
    const min = options.minPoolSize ?? DEFAULT_MIN_POOL_SIZE;
    const max = options.maxPoolSize ?? DEFAULT_MAX_POOL_SIZE;
    if (min < 0 || max < 1 || min > max) {
      throw validationFailed([{ path: 'maxPoolSize', message: `invalid pool size: min=${min} max=${max}` }]);
    }

    const target: PoolConfig = options.connectionString
      ? { connectionString: options.connectionString }
      : {
          host: options.host ?? 'localhost',
          port: options.port ?? 5432,
          user: options.user ?? 'postgres',
          password: options.password ?? 'postgres',
          database: options.database ?? 'dmo',
        };

    this.poolConfig = {
      ...target,
      min,
      max,
      connectionTimeoutMillis: options.acquireTimeoutMs ?? 0,
    };
    this.poolFactory = options.poolFactory ?? ((config) => new Pool(config));
    this.log = options.logger ?? createLogger('postgresBackend');
  }

  // ============================================
  // Lifecycle
  // ============================================

  async init(): Promise<void> {
    if (this.pool) return;

    const pool = this.poolFactory(this.poolConfig);
    if (!this.schemaReady) {
      try {
        for (const statement of SCHEMA) {
          await pool.query(statement);
        }
      } catch (err) {
        await pool.end();
        throw this.fail('init', err);
      }
      this.schemaReady = true;
    }
    this.pool = pool;

    this.log.info({ min: this.poolConfig.min, max: this.poolConfig.max }, '[postgresBackend] Pool ready, schema ensured');
  }

  async close(): Promise<void> {
    if (!this.pool) return;
    const pool = this.pool;
    this.pool = null;
    await pool.end();
    this.log.info('[postgresBackend] Pool closed');
  }

  // ============================================
  // Helpers
  // ============================================

  private async run<T>(operation: string, fn: (pool: Pool) => Promise<T>): Promise<T> {
    if (!this.pool) {
      throw storageFailure(operation, new Error('Connection pool not initialized. Call init() first.'));
    }
    try {
      return await fn(this.pool);
    } catch (err) {
      throw this.fail(operation, err);
    }
  }

  private fail(operation: string, err: unknown): DmoError {
    if (isDmoError(err)) return err;
    const retryable = isPoolTimeout(err);
    this.log.error({ err, operation, retryable }, `[postgresBackend] ${operation} failed`);
    return toStorageError(operation, err, retryable);
  }

  private async rows<R extends QueryResultRow>(
    db: Queryable,
    text: string,
    values: unknown[] = []
  ): Promise<R[]> {
    const result = await db.query<R>(text, values);
    return result.rows;
  }

  private async first<R extends QueryResultRow>(
    db: Queryable,
    text: string,
    values: unknown[] = []
  ): Promise<R | undefined> {
    const [row] = await this.rows<R>(db, text, values);
    return row;
  }

  private async requireRoutine(db: Queryable, routineId: number): Promise<RoutineRow> {
    const row = await this.first<RoutineRow>(db, 'SELECT * FROM routines WHERE id = $1', [routineId]);
    if (!row) throw routineNotFound(routineId);
    return row;
  }

  private async requireActivity(db: Queryable, activityId: number): Promise<ActivityRow> {
    const row = await this.first<ActivityRow>(db, 'SELECT * FROM activities WHERE id = $1', [activityId]);
    if (!row) throw activityNotFound(activityId);
    return row;
  }

  private async assertNameFree(db: Queryable, name: string, exceptId?: number): Promise<void> {
    const row = await this.first<{ id: number }>(
      db,
      'SELECT id FROM routines WHERE name = $1 AND id <> $2',
      [name, exceptId ?? 0]
    );
    if (row) throw duplicateName(name);
  }

  // ============================================
  // Routines
  // ============================================

  async createRoutine(input: RoutineCreate): Promise<Routine> {
    const data = withNormalizedName(input);
    return this.run('createRoutine', async (pool) => {
      await this.assertNameFree(pool, data.name);
      try {
        const row = await this.first<RoutineRow>(
          pool,
          `INSERT INTO routines (name, description, active, timezone)
           VALUES ($1, $2, TRUE, $3)
           RETURNING *`,
          [data.name, data.description ?? null, data.timezone ?? null]
        );
        if (!row) throw new Error('INSERT returned no row');
        return rowToRoutine(row);
      } catch (err) {
        if (pgErrorCode(err) === PG_UNIQUE_VIOLATION) throw duplicateName(data.name);
        throw err;
      }
    });
  }

  async getRoutine(routineId: number): Promise<Routine> {
    return this.run('getRoutine', async (pool) => rowToRoutine(await this.requireRoutine(pool, routineId)));
  }

  async listRoutines(options: ListRoutinesOptions = {}): Promise<Routine[]> {
    return this.run('listRoutines', async (pool) => {
      const sql = options.includeInactive
        ? 'SELECT * FROM routines ORDER BY name ASC'
        : 'SELECT * FROM routines WHERE active = TRUE ORDER BY name ASC';
      const rows = await this.rows<RoutineRow>(pool, sql);
      return rows.map(rowToRoutine);
    });
  }

  async updateRoutine(routineId: number, changes: RoutineUpdate): Promise<Routine> {
    const patch = withNormalizedName(changes);
    return this.run('updateRoutine', async (pool) => {
      const existing = await this.requireRoutine(pool, routineId);

      const sets: string[] = [];
      const values: unknown[] = [];
      const assign = (column: string, value: unknown) => {
        values.push(value);
        sets.push(`${column} = $${values.length}`);
      };

      if (patch.name !== undefined) assign('name', patch.name);
      if (patch.description !== undefined) assign('description', patch.description);
      if (patch.timezone !== undefined) assign('timezone', patch.timezone);
      if (patch.active !== undefined) assign('active', patch.active);

      if (sets.length === 0) return rowToRoutine(existing);

      if (patch.name !== undefined && patch.name !== existing.name) {
        await this.assertNameFree(pool, patch.name, routineId);
      }

      sets.push('updated_at = NOW()');
      values.push(routineId);

      try {
        const row = await this.first<RoutineRow>(
          pool,
          `UPDATE routines SET ${sets.join(', ')} WHERE id = $${values.length} RETURNING *`,
          values
        );
        if (!row) throw routineNotFound(routineId);
        return rowToRoutine(row);
      } catch (err) {
        if (pgErrorCode(err) === PG_UNIQUE_VIOLATION && patch.name !== undefined) {
          throw duplicateName(patch.name);
        }
        throw err;
      }
    });
  }

  async deleteRoutine(routineId: number): Promise<void> {
    await this.run('deleteRoutine', async (pool) => {
      const client = await pool.connect();
      let brokenConnection: Error | undefined;
      try {
        await client.query('BEGIN');
        await client.query('DELETE FROM completions WHERE routine_id = $1', [routineId]);
        await client.query('DELETE FROM activities WHERE routine_id = $1', [routineId]);
        const deleted = await this.rows<{ id: number }>(
          client,
          'DELETE FROM routines WHERE id = $1 RETURNING id',
          [routineId]
        );
        if (deleted.length === 0) throw routineNotFound(routineId);
        await client.query('COMMIT');
      } catch (err) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackErr) {
          // Hand the error to release() so the pool discards this client
          brokenConnection = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
          this.log.error({ err: rollbackErr, routineId }, '[postgresBackend] ROLLBACK failed');
        }
        throw err;
      } finally {
        client.release(brokenConnection);
      }
    });
  }

  // ============================================
  // Activities
  // ============================================

  async createActivity(input: ActivityCreate): Promise<Activity> {
    const data = withNormalizedName(input);
    return this.run('createActivity', async (pool) => {
      await this.requireRoutine(pool, data.routineId);
      try {
        const row = await this.first<ActivityRow>(
          pool,
          `INSERT INTO activities (routine_id, name, "order")
           VALUES ($1, $2, $3)
           RETURNING *`,
          [data.routineId, data.name, data.order ?? 0]
        );
        if (!row) throw new Error('INSERT returned no row');
        return rowToActivity(row);
      } catch (err) {
        if (pgErrorCode(err) === PG_FOREIGN_KEY_VIOLATION) throw routineNotFound(data.routineId);
        throw err;
      }
    });
  }

  async getActivity(activityId: number): Promise<Activity> {
    return this.run('getActivity', async (pool) => rowToActivity(await this.requireActivity(pool, activityId)));
  }

  async listActivities(routineId: number): Promise<Activity[]> {
    return this.run('listActivities', async (pool) => {
      await this.requireRoutine(pool, routineId);
      const rows = await this.rows<ActivityRow>(
        pool,
        'SELECT * FROM activities WHERE routine_id = $1 ORDER BY "order" ASC, created_at ASC, id ASC',
        [routineId]
      );
      return rows.map(rowToActivity);
    });
  }

  async updateActivity(activityId: number, changes: ActivityUpdate): Promise<Activity> {
    const patch = withNormalizedName(changes);
    return this.run('updateActivity', async (pool) => {
      const existing = await this.requireActivity(pool, activityId);

      const sets: string[] = [];
      const values: unknown[] = [];
      if (patch.name !== undefined) {
        values.push(patch.name);
        sets.push(`name = $${values.length}`);
      }
      if (patch.order !== undefined) {
        values.push(patch.order);
        sets.push(`"order" = $${values.length}`);
      }

      if (sets.length === 0) return rowToActivity(existing);

      sets.push('updated_at = NOW()');
      values.push(activityId);

      const row = await this.first<ActivityRow>(
        pool,
        `UPDATE activities SET ${sets.join(', ')} WHERE id = $${values.length} RETURNING *`,
        values
      );
      if (!row) throw activityNotFound(activityId);
      return rowToActivity(row);
    });
  }

  async deleteActivity(activityId: number): Promise<void> {
    await this.run('deleteActivity', async (pool) => {
      const deleted = await this.rows<{ id: number }>(
        pool,
        'DELETE FROM activities WHERE id = $1 RETURNING id',
        [activityId]
      );
      if (deleted.length === 0) throw activityNotFound(activityId);
    });
  }

  // ============================================
  // Completions
  // ============================================

  async setCompletion(
    routineId: number,
    date: CalendarDate,
    completed: boolean,
    note: string | null = null
  ): Promise<CompletionRecord> {
    return this.run('setCompletion', async (pool) => {
      await this.requireRoutine(pool, routineId);

      // Update first: ON CONFLICT alone would draw a fresh SERIAL on every re-write
      const updated = await this.first<CompletionRow>(
        pool,
        `UPDATE completions SET completed = $3, note = $4, updated_at = NOW()
         WHERE routine_id = $1 AND "date" = $2
         RETURNING *`,
        [routineId, date, completed, note]
      );
      if (updated) return rowToCompletion(updated);

      try {
        const row = await this.first<CompletionRow>(
          pool,
          `INSERT INTO completions (routine_id, "date", completed, note)
           VALUES ($1, $2, $3, $4)
           ON CONFLICT (routine_id, "date") DO UPDATE SET
             completed = EXCLUDED.completed,
             note = EXCLUDED.note,
             updated_at = NOW()
           RETURNING *`,
          [routineId, date, completed, note]
        );
        if (!row) throw new Error('UPSERT returned no row');
        return rowToCompletion(row);
      } catch (err) {
        if (pgErrorCode(err) === PG_FOREIGN_KEY_VIOLATION) throw routineNotFound(routineId);
        throw err;
      }
    });
  }

  async getCompletion(routineId: number, date: CalendarDate): Promise<CompletionRecord | null> {
    return this.run('getCompletion', async (pool) => {
      await this.requireRoutine(pool, routineId);
      const row = await this.first<CompletionRow>(
        pool,
        'SELECT * FROM completions WHERE routine_id = $1 AND "date" = $2',
        [routineId, date]
      );
      return row ? rowToCompletion(row) : null;
    });
  }

  async listCompletions(routineId: number, start: CalendarDate, end: CalendarDate): Promise<CompletionRecord[]> {
    return this.run('listCompletions', async (pool) => {
      if (start > end) throw invalidRange(start, end);
      await this.requireRoutine(pool, routineId);
      const rows = await this.rows<CompletionRow>(
        pool,
        `SELECT * FROM completions
         WHERE routine_id = $1 AND "date" >= $2 AND "date" <= $3
         ORDER BY "date" ASC`,
        [routineId, start, end]
      );
      return rows.map(rowToCompletion);
    });
  }

  async countCompleted(routineId: number, start: CalendarDate, end: CalendarDate): Promise<number> {
    return this.run('countCompleted', async (pool) => {
      if (start > end) throw invalidRange(start, end);
      await this.requireRoutine(pool, routineId);
      const row = await this.first<CountRow>(
        pool,
        `SELECT COUNT(*) AS count FROM completions
         WHERE routine_id = $1 AND "date" >= $2 AND "date" <= $3 AND completed = TRUE`,
        [routineId, start, end]
      );
      return rowToCount(row);
    });
  }
}
