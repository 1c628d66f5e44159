/**
 * SQLite Storage Backend
 *
 * Embedded single-file engine on better-sqlite3. Calls are synchronous
 * under the hood and wrapped in the async contract.
 *
 * Integrity:
 * - Routine names are unique through the UNIQUE constraint alone; a
 *   violation becomes duplicate-name (no check-then-insert window)
 * - Completions upsert inside one transaction (UPDATE, then INSERT)
 * - Foreign keys are enabled per connection so deletes cascade
 */

import * as fs from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';

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
import { utcNow } from '../utils/dates';
import {
  activityNotFound,
  duplicateName,
  invalidRange,
  isDmoError,
  routineNotFound,
  storageFailure,
  toStorageError,
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

export const IN_MEMORY_PATH = ':memory:';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS routines (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    description TEXT,
    active INTEGER NOT NULL DEFAULT 1,
    timezone TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS activities (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    routine_id INTEGER NOT NULL,
    name TEXT NOT NULL,
    "order" INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    FOREIGN KEY (routine_id) REFERENCES routines(id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_activities_routine_id ON activities(routine_id);
  CREATE INDEX IF NOT EXISTS idx_activities_order ON activities(routine_id, "order");

  CREATE TABLE IF NOT EXISTS completions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    routine_id INTEGER NOT NULL,
    date TEXT NOT NULL,
    completed INTEGER NOT NULL,
    note TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    FOREIGN KEY (routine_id) REFERENCES routines(id) ON DELETE CASCADE,
    UNIQUE (routine_id, date)
  );

  CREATE INDEX IF NOT EXISTS idx_completions_routine_date ON completions(routine_id, date);
`;

export interface SqliteBackendOptions {
  /** Database file, or ':memory:' (default) */
  dbPath?: string;
  logger?: Logger;
}

type SqlValue = string | number | null;

/** Matched on the driver's `code`, not on its error class. */
export function isUniqueViolation(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 'SQLITE_CONSTRAINT_UNIQUE'
  );
}

export class SqliteBackend implements StorageBackend {
  readonly kind = 'sqlite' as const;

  readonly dbPath: string;
  private readonly log: Logger;
  private db: Database.Database | null = null;

  constructor(options: SqliteBackendOptions = {}) {
    this.dbPath = options.dbPath ?? IN_MEMORY_PATH;
    this.log = options.logger ?? createLogger('sqliteBackend');
  }

  // ============================================
  // Lifecycle
  // ============================================

  async init(): Promise<void> {
    if (this.db) return;

    try {
      if (this.dbPath !== IN_MEMORY_PATH) {
        fs.mkdirSync(dirname(this.dbPath), { recursive: true });
      }

      const db = new Database(this.dbPath);
      db.pragma('foreign_keys = ON');
      if (this.dbPath !== IN_MEMORY_PATH) {
        db.pragma('journal_mode = WAL');
      }
      db.exec(SCHEMA);
      this.db = db;
    } catch (err) {
      throw this.fail('init', err);
    }

    this.log.info({ dbPath: this.dbPath }, '[sqliteBackend] Schema ready');
  }

  async close(): Promise<void> {
    if (!this.db) return;
    this.db.close();
    this.db = null;
    this.log.info({ dbPath: this.dbPath }, '[sqliteBackend] Closed');
  }

  // ============================================
  // Helpers
  // ============================================

  /**
   * Run `fn` against the open connection, translating anything that is not
   * already a DmoError into a storage error for `operation`.
   */
  private run<T>(operation: string, fn: (db: Database.Database) => T): T {
    if (!this.db) {
      throw storageFailure(operation, new Error('Database not initialized. Call init() first.'));
    }
    try {
      return fn(this.db);
    } catch (err) {
      throw this.fail(operation, err);
    }
  }

  private fail(operation: string, err: unknown): DmoError {
    if (isDmoError(err)) return err;
    this.log.error({ err, operation }, `[sqliteBackend] ${operation} failed`);
    return toStorageError(operation, err);
  }

  private selectRoutine(db: Database.Database, routineId: number): RoutineRow | undefined {
    return db.prepare<[number], RoutineRow>('SELECT * FROM routines WHERE id = ?').get(routineId);
  }

  private requireRoutine(db: Database.Database, routineId: number): RoutineRow {
    const row = this.selectRoutine(db, routineId);
    if (!row) throw routineNotFound(routineId);
    return row;
  }

  private requireActivity(db: Database.Database, activityId: number): ActivityRow {
    const row = db.prepare<[number], ActivityRow>('SELECT * FROM activities WHERE id = ?').get(activityId);
    if (!row) throw activityNotFound(activityId);
    return row;
  }

  // ============================================
  // Routines
  // ============================================

  async createRoutine(input: RoutineCreate): Promise<Routine> {
    const data = withNormalizedName(input);
    return this.run('createRoutine', (db) => {
      const now = utcNow().toISOString();
      try {
        const row = db
          .prepare<SqlValue[], RoutineRow>(
            `INSERT INTO routines (name, description, active, timezone, created_at, updated_at)
             VALUES (?, ?, 1, ?, ?, ?)
             RETURNING *`
          )
          .get(data.name, data.description ?? null, data.timezone ?? null, now, now);
        if (!row) throw new Error('INSERT returned no row');
        return rowToRoutine(row);
      } catch (err) {
        if (isUniqueViolation(err)) throw duplicateName(data.name);
        throw err;
      }
    });
  }

  async getRoutine(routineId: number): Promise<Routine> {
    return this.run('getRoutine', (db) => rowToRoutine(this.requireRoutine(db, routineId)));
  }

  async listRoutines(options: ListRoutinesOptions = {}): Promise<Routine[]> {
    return this.run('listRoutines', (db) => {
      const sql = options.includeInactive
        ? 'SELECT * FROM routines ORDER BY name ASC'
        : 'SELECT * FROM routines WHERE active = 1 ORDER BY name ASC';
      return db.prepare<[], RoutineRow>(sql).all().map(rowToRoutine);
    });
  }

  async updateRoutine(routineId: number, changes: RoutineUpdate): Promise<Routine> {
    const patch = withNormalizedName(changes);
    return this.run('updateRoutine', (db) => {
      const existing = this.requireRoutine(db, routineId);

      const sets: string[] = [];
      const values: SqlValue[] = [];
      if (patch.name !== undefined) {
        sets.push('name = ?');
        values.push(patch.name);
      }
      if (patch.description !== undefined) {
        sets.push('description = ?');
        values.push(patch.description);
      }
      if (patch.timezone !== undefined) {
        sets.push('timezone = ?');
        values.push(patch.timezone);
      }
      if (patch.active !== undefined) {
        sets.push('active = ?');
        values.push(patch.active ? 1 : 0);
      }

      if (sets.length === 0) return rowToRoutine(existing);

      sets.push('updated_at = ?');
      values.push(utcNow().toISOString(), routineId);

      try {
        const row = db
          .prepare<SqlValue[], RoutineRow>(`UPDATE routines SET ${sets.join(', ')} WHERE id = ? RETURNING *`)
          .get(...values);
        if (!row) throw routineNotFound(routineId);
        return rowToRoutine(row);
      } catch (err) {
        if (isUniqueViolation(err) && patch.name !== undefined) throw duplicateName(patch.name);
        throw err;
      }
    });
  }

  async deleteRoutine(routineId: number): Promise<void> {
    this.run('deleteRoutine', (db) => {
      const result = db.prepare<[number]>('DELETE FROM routines WHERE id = ?').run(routineId);
      if (result.changes === 0) throw routineNotFound(routineId);
    });
  }

  // ============================================
  // Activities
  // ============================================

  async createActivity(input: ActivityCreate): Promise<Activity> {
    const data = withNormalizedName(input);
    return this.run('createActivity', (db) => {
      const insert = db.transaction((): ActivityRow | undefined => {
        this.requireRoutine(db, data.routineId);
        const now = utcNow().toISOString();
        return db
          .prepare<SqlValue[], ActivityRow>(
            `INSERT INTO activities (routine_id, name, "order", created_at, updated_at)
             VALUES (?, ?, ?, ?, ?)
             RETURNING *`
          )
          .get(data.routineId, data.name, data.order ?? 0, now, now);
      });

      const row = insert();
      if (!row) throw new Error('INSERT returned no row');
      return rowToActivity(row);
    });
  }

  async getActivity(activityId: number): Promise<Activity> {
    return this.run('getActivity', (db) => rowToActivity(this.requireActivity(db, activityId)));
  }

  async listActivities(routineId: number): Promise<Activity[]> {
    return this.run('listActivities', (db) => {
      this.requireRoutine(db, routineId);
      return db
        .prepare<[number], ActivityRow>(
          'SELECT * FROM activities WHERE routine_id = ? ORDER BY "order" ASC, created_at ASC, id ASC'
        )
        .all(routineId)
        .map(rowToActivity);
    });
  }

  async updateActivity(activityId: number, changes: ActivityUpdate): Promise<Activity> {
    const patch = withNormalizedName(changes);
    return this.run('updateActivity', (db) => {
      const existing = this.requireActivity(db, activityId);

      const sets: string[] = [];
      const values: SqlValue[] = [];
      if (patch.name !== undefined) {
        sets.push('name = ?');
        values.push(patch.name);
      }
      if (patch.order !== undefined) {
        sets.push('"order" = ?');
        values.push(patch.order);
      }

      if (sets.length === 0) return rowToActivity(existing);

      sets.push('updated_at = ?');
      values.push(utcNow().toISOString(), activityId);

      const row = db
        .prepare<SqlValue[], ActivityRow>(`UPDATE activities SET ${sets.join(', ')} WHERE id = ? RETURNING *`)
        .get(...values);
      if (!row) throw activityNotFound(activityId);
      return rowToActivity(row);
    });
  }

  async deleteActivity(activityId: number): Promise<void> {
    this.run('deleteActivity', (db) => {
      const result = db.prepare<[number]>('DELETE FROM activities WHERE id = ?').run(activityId);
      if (result.changes === 0) throw activityNotFound(activityId);
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
    return this.run('setCompletion', (db) => {
      // Update first: a conflicting INSERT still draws a new AUTOINCREMENT value
      const upsert = db.transaction((): CompletionRow | undefined => {
        this.requireRoutine(db, routineId);
        const now = utcNow().toISOString();
        const updated = db
          .prepare<SqlValue[], CompletionRow>(
            `UPDATE completions SET completed = ?, note = ?, updated_at = ?
             WHERE routine_id = ? AND date = ?
             RETURNING *`
          )
          .get(completed ? 1 : 0, note, now, routineId, date);
        if (updated) return updated;

        return db
          .prepare<SqlValue[], CompletionRow>(
            `INSERT INTO completions (routine_id, date, completed, note, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?, ?)
             RETURNING *`
          )
          .get(routineId, date, completed ? 1 : 0, note, now, now);
      });

      const row = upsert();
      if (!row) throw new Error('UPSERT returned no row');
      return rowToCompletion(row);
    });
  }

  async getCompletion(routineId: number, date: CalendarDate): Promise<CompletionRecord | null> {
    return this.run('getCompletion', (db) => {
      this.requireRoutine(db, routineId);
      const row = db
        .prepare<[number, string], CompletionRow>('SELECT * FROM completions WHERE routine_id = ? AND date = ?')
        .get(routineId, date);
      return row ? rowToCompletion(row) : null;
    });
  }

  async listCompletions(routineId: number, start: CalendarDate, end: CalendarDate): Promise<CompletionRecord[]> {
    return this.run('listCompletions', (db) => {
      if (start > end) throw invalidRange(start, end);
      this.requireRoutine(db, routineId);
      return db
        .prepare<[number, string, string], CompletionRow>(
          `SELECT * FROM completions
           WHERE routine_id = ? AND date >= ? AND date <= ?
           ORDER BY date ASC`
        )
        .all(routineId, start, end)
        .map(rowToCompletion);
    });
  }

  async countCompleted(routineId: number, start: CalendarDate, end: CalendarDate): Promise<number> {
    return this.run('countCompleted', (db) => {
      if (start > end) throw invalidRange(start, end);
      this.requireRoutine(db, routineId);
      const row = db
        .prepare<[number, string, string], CountRow>(
          `SELECT COUNT(*) AS count FROM completions
           WHERE routine_id = ? AND date >= ? AND date <= ? AND completed = 1`
        )
        .get(routineId, start, end);
      return rowToCount(row);
    });
  }
}
