/**
 * DMO Core
 *
 * Daily Method of Operation tracker: routines, their activity checklists,
 * a per-day completion ledger and the reports built on top of it.
 */

// ============================================
// SERVICE - Validated entry point
// ============================================
export { DmoService, type DmoServiceOptions } from './service/dmoService';

// ============================================
// STORAGE - Interchangeable engines
// ============================================
export { compareActivities, compareRoutineNames, type BackendKind, type StorageBackend } from './storage/backend';
export { MemoryBackend, type MemoryBackendOptions } from './storage/memoryBackend';
export { SqliteBackend, IN_MEMORY_PATH, type SqliteBackendOptions } from './storage/sqliteBackend';
export {
  PostgresBackend,
  DEFAULT_MIN_POOL_SIZE,
  DEFAULT_MAX_POOL_SIZE,
  type PostgresBackendOptions,
} from './storage/postgresBackend';

// ============================================
// REPORTS - Pure streak and summary math
// ============================================
export { buildDailyReport, buildMonthlyReport, buildRoutineSummary, type DailySnapshot } from './reports/reportEngine';
export { calculateStreaks, calculateCompletionRate, COMPLETION_RATE_PRECISION } from './utils/streaks';

// ============================================
// CONFIG
// ============================================
export { loadConfig, createBackend, DEFAULT_DB_PATH, type DmoConfig, type PostgresConfig } from './config';

// ============================================
// ERRORS & UTILITIES
// ============================================
export {
  DmoError,
  isDmoError,
  toStorageError,
  type DmoErrorCategory,
  type DmoErrorDetails,
  type DmoErrorKind,
  type ValidationIssue,
} from './utils/errors';
export { dateRange, daysInMonth, formatCalendarDate, isCalendarDate, monthBounds } from './utils/dates';
export { createLogger, logger, type Logger } from './utils/logger';

export type * from './types';
