/**
 * Storage Backend Contract
 *
 * Entity Store (routines, activities) + Completion Ledger, implemented by
 * every persistence engine. Callers depend on this interface only; the
 * memory, SQLite and Postgres engines must be indistinguishable through it.
 *
 * All methods reject with DmoError. Inputs are assumed already validated
 * (see DmoService); names arrive trimmed.
 */

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

export type BackendKind = 'memory' | 'sqlite' | 'postgres';

export interface StorageBackend {
  readonly kind: BackendKind;

  // ============================================
  // Lifecycle
  // ============================================

  /** Create schema/state if absent. Safe to call repeatedly. */
  init(): Promise<void>;

  /** Release resources. The backend is unusable until `init()` runs again. */
  close(): Promise<void>;

  // ============================================
  // Routines
  // ============================================

  /** @throws duplicate-name */
  createRoutine(data: RoutineCreate): Promise<Routine>;

  /** @throws routine-not-found */
  getRoutine(routineId: number): Promise<Routine>;

  /** Sorted by name ascending; inactive routines only when asked for. */
  listRoutines(options?: ListRoutinesOptions): Promise<Routine[]>;

  /**
   * Merge-patch update; undefined keys are left alone.
   * @throws routine-not-found, duplicate-name
   */
  updateRoutine(routineId: number, patch: RoutineUpdate): Promise<Routine>;

  /**
   * Hard delete, cascading to activities and completions.
   * @throws routine-not-found
   */
  deleteRoutine(routineId: number): Promise<void>;

  // ============================================
  // Activities
  // ============================================

  /** @throws routine-not-found */
  createActivity(data: ActivityCreate): Promise<Activity>;

  /** @throws activity-not-found */
  getActivity(activityId: number): Promise<Activity>;

  /**
   * Sorted by order, then creation time, then id.
   * @throws routine-not-found
   */
  listActivities(routineId: number): Promise<Activity[]>;

  /** @throws activity-not-found */
  updateActivity(activityId: number, patch: ActivityUpdate): Promise<Activity>;

  /** Completions are unaffected. @throws activity-not-found */
  deleteActivity(activityId: number): Promise<void>;

  // ============================================
  // Completions
  // ============================================

  /**
   * Idempotent upsert keyed by (routineId, date). An existing record keeps
   * its id and createdAt.
   * @throws routine-not-found
   */
  setCompletion(
    routineId: number,
    date: CalendarDate,
    completed: boolean,
    note?: string | null
  ): Promise<CompletionRecord>;

  /** null when no record exists. @throws routine-not-found */
  getCompletion(routineId: number, date: CalendarDate): Promise<CompletionRecord | null>;

  /**
   * Inclusive range, sorted by date ascending.
   * @throws invalid-range, routine-not-found
   */
  listCompletions(routineId: number, start: CalendarDate, end: CalendarDate): Promise<CompletionRecord[]>;

  /**
   * Number of completed records in the inclusive range.
   * @throws invalid-range, routine-not-found
   */
  countCompleted(routineId: number, start: CalendarDate, end: CalendarDate): Promise<number>;
}

/**
 * Comparator shared by the engines that sort in application code, matching
 * `ORDER BY "order", created_at, id`.
 */
export function compareActivities(a: Activity, b: Activity): number {
  return a.order - b.order || a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id;
}

/**
 * Binary (code unit) name comparison, matching `ORDER BY name` under a
 * byte-wise collation.
 */
export function compareRoutineNames(a: Routine, b: Routine): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/** Names are stored trimmed, so uniqueness ignores surrounding whitespace. */
export function normalizeName(name: string): string {
  return name.trim();
}

export function withNormalizedName<T extends { name?: string }>(input: T): T {
  return input.name === undefined ? input : { ...input, name: normalizeName(input.name) };
}
