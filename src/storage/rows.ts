/**
 * Row Marshalling
 *
 * Typed row shapes for the SQL engines and the functions that turn them
 * into domain records. SQLite hands back 0/1 and ISO text, Postgres hands
 * back booleans, Dates and (for COUNT) bigint strings; both go through
 * the same date helpers so records compare equal across engines.
 */

import type { Activity, CompletionRecord, Routine } from '../types';
import { toCalendarDate, toTimestamp } from '../utils/dates';

type DbBoolean = boolean | number;
type DbTimestamp = Date | string;

export type RoutineRow = {
  id: number;
  name: string;
  description: string | null;
  active: DbBoolean;
  timezone: string | null;
  created_at: DbTimestamp;
  updated_at: DbTimestamp;
};

export type ActivityRow = {
  id: number;
  routine_id: number;
  name: string;
  order: number;
  created_at: DbTimestamp;
  updated_at: DbTimestamp;
};

export type CompletionRow = {
  id: number;
  routine_id: number;
  date: Date | string;
  completed: DbBoolean;
  note: string | null;
  created_at: DbTimestamp;
  updated_at: DbTimestamp;
};

export type CountRow = {
  count: number | string;
};

function toBoolean(value: DbBoolean): boolean {
  return typeof value === 'number' ? value !== 0 : value;
}

export function rowToRoutine(row: RoutineRow): Routine {
  return {
    id: Number(row.id),
    name: row.name,
    description: row.description,
    timezone: row.timezone,
    active: toBoolean(row.active),
    createdAt: toTimestamp(row.created_at),
    updatedAt: toTimestamp(row.updated_at),
  };
}

export function rowToActivity(row: ActivityRow): Activity {
  return {
    id: Number(row.id),
    routineId: Number(row.routine_id),
    name: row.name,
    order: Number(row.order),
    createdAt: toTimestamp(row.created_at),
    updatedAt: toTimestamp(row.updated_at),
  };
}

export function rowToCompletion(row: CompletionRow): CompletionRecord {
  return {
    id: Number(row.id),
    routineId: Number(row.routine_id),
    date: toCalendarDate(row.date),
    completed: toBoolean(row.completed),
    note: row.note,
    createdAt: toTimestamp(row.created_at),
    updatedAt: toTimestamp(row.updated_at),
  };
}

export function rowToCount(row: CountRow | undefined): number {
  return row ? Number(row.count) : 0;
}
