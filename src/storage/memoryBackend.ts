/**
 * In-Memory Storage Backend
 *
 * Map-backed engine for tests and throwaway sessions. No concurrency
 * control: one caller at a time. close() wipes everything and resets the
 * id sequences.
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
import { utcNow } from '../utils/dates';
import {
  activityNotFound,
  duplicateName,
  invalidRange,
  routineNotFound,
  storageFailure,
} from '../utils/errors';
import { createLogger, type Logger } from '../utils/logger';
import { compareActivities, compareRoutineNames, withNormalizedName, type StorageBackend } from './backend';

export interface MemoryBackendOptions {
  logger?: Logger;
}

function completionKey(routineId: number, date: CalendarDate): string {
  return `${routineId}:${date}`;
}

export class MemoryBackend implements StorageBackend {
  readonly kind = 'memory' as const;

  private readonly log: Logger;
  private ready = false;

  private routines = new Map<number, Routine>();
  private activities = new Map<number, Activity>();
  /** Keyed by `${routineId}:${date}` */
  private completions = new Map<string, CompletionRecord>();

  private nextRoutineId = 1;
  private nextActivityId = 1;
  private nextCompletionId = 1;

  constructor(options: MemoryBackendOptions = {}) {
    this.log = options.logger ?? createLogger('memoryBackend');
  }

  // ============================================
  // Lifecycle
  // ============================================

  async init(): Promise<void> {
    if (this.ready) return;
    this.ready = true;
    this.log.debug('[memoryBackend] Ready');
  }

  async close(): Promise<void> {
    this.routines.clear();
    this.activities.clear();
    this.completions.clear();
    this.nextRoutineId = 1;
    this.nextActivityId = 1;
    this.nextCompletionId = 1;
    this.ready = false;
    this.log.debug('[memoryBackend] Closed, state cleared');
  }

  private assertReady(operation: string): void {
    if (!this.ready) {
      throw storageFailure(operation, new Error('Backend not initialized. Call init() first.'));
    }
  }

  private requireRoutine(routineId: number): Routine {
    const routine = this.routines.get(routineId);
    if (!routine) throw routineNotFound(routineId);
    return routine;
  }

  private requireActivity(activityId: number): Activity {
    const activity = this.activities.get(activityId);
    if (!activity) throw activityNotFound(activityId);
    return activity;
  }

  private assertNameFree(name: string, exceptId?: number): void {
    for (const routine of this.routines.values()) {
      if (routine.name === name && routine.id !== exceptId) {
        throw duplicateName(name);
      }
    }
  }

  // ============================================
  // Routines
  // ============================================

  async createRoutine(input: RoutineCreate): Promise<Routine> {
    const data = withNormalizedName(input);
    this.assertReady('createRoutine');
    this.assertNameFree(data.name);

    const now = utcNow();
    const routine: Routine = {
      id: this.nextRoutineId++,
      name: data.name,
      description: data.description ?? null,
      timezone: data.timezone ?? null,
      active: true,
      createdAt: now,
      updatedAt: now,
    };
    this.routines.set(routine.id, routine);
    return { ...routine };
  }

  async getRoutine(routineId: number): Promise<Routine> {
    this.assertReady('getRoutine');
    return { ...this.requireRoutine(routineId) };
  }

  async listRoutines(options: ListRoutinesOptions = {}): Promise<Routine[]> {
    this.assertReady('listRoutines');
    return [...this.routines.values()]
      .filter((routine) => options.includeInactive || routine.active)
      .sort(compareRoutineNames)
      .map((routine) => ({ ...routine }));
  }

  async updateRoutine(routineId: number, changes: RoutineUpdate): Promise<Routine> {
    const patch = withNormalizedName(changes);
    this.assertReady('updateRoutine');
    const existing = this.requireRoutine(routineId);

    if (patch.name !== undefined && patch.name !== existing.name) {
      this.assertNameFree(patch.name, routineId);
    }

    const changed =
      patch.name !== undefined ||
      patch.description !== undefined ||
      patch.timezone !== undefined ||
      patch.active !== undefined;
    if (!changed) return { ...existing };

    const updated: Routine = {
      ...existing,
      name: patch.name ?? existing.name,
      description: patch.description ?? existing.description,
      timezone: patch.timezone ?? existing.timezone,
      active: patch.active ?? existing.active,
      updatedAt: utcNow(),
    };
    this.routines.set(routineId, updated);
    return { ...updated };
  }

  async deleteRoutine(routineId: number): Promise<void> {
    this.assertReady('deleteRoutine');
    this.requireRoutine(routineId);

    for (const [id, activity] of this.activities) {
      if (activity.routineId === routineId) this.activities.delete(id);
    }
    for (const [key, completion] of this.completions) {
      if (completion.routineId === routineId) this.completions.delete(key);
    }
    this.routines.delete(routineId);
  }

  // ============================================
  // Activities
  // ============================================

  async createActivity(input: ActivityCreate): Promise<Activity> {
    const data = withNormalizedName(input);
    this.assertReady('createActivity');
    this.requireRoutine(data.routineId);

    const now = utcNow();
    const activity: Activity = {
      id: this.nextActivityId++,
      routineId: data.routineId,
      name: data.name,
      order: data.order ?? 0,
      createdAt: now,
      updatedAt: now,
    };
    this.activities.set(activity.id, activity);
    return { ...activity };
  }

  async getActivity(activityId: number): Promise<Activity> {
    this.assertReady('getActivity');
    return { ...this.requireActivity(activityId) };
  }

  async listActivities(routineId: number): Promise<Activity[]> {
    this.assertReady('listActivities');
    this.requireRoutine(routineId);

    return [...this.activities.values()]
      .filter((activity) => activity.routineId === routineId)
      .sort(compareActivities)
      .map((activity) => ({ ...activity }));
  }

  async updateActivity(activityId: number, changes: ActivityUpdate): Promise<Activity> {
    const patch = withNormalizedName(changes);
    this.assertReady('updateActivity');
    const existing = this.requireActivity(activityId);

    if (patch.name === undefined && patch.order === undefined) {
      return { ...existing };
    }

    const updated: Activity = {
      ...existing,
      name: patch.name ?? existing.name,
      order: patch.order ?? existing.order,
      updatedAt: utcNow(),
    };
    this.activities.set(activityId, updated);
    return { ...updated };
  }

  async deleteActivity(activityId: number): Promise<void> {
    this.assertReady('deleteActivity');
    this.requireActivity(activityId);
    this.activities.delete(activityId);
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
    this.assertReady('setCompletion');
    this.requireRoutine(routineId);

    const key = completionKey(routineId, date);
    const existing = this.completions.get(key);
    const now = utcNow();

    const record: CompletionRecord = existing
      ? { ...existing, completed, note, updatedAt: now }
      : {
          id: this.nextCompletionId++,
          routineId,
          date,
          completed,
          note,
          createdAt: now,
          updatedAt: now,
        };

    this.completions.set(key, record);
    return { ...record };
  }

  async getCompletion(routineId: number, date: CalendarDate): Promise<CompletionRecord | null> {
    this.assertReady('getCompletion');
    this.requireRoutine(routineId);

    const record = this.completions.get(completionKey(routineId, date));
    return record ? { ...record } : null;
  }

  async listCompletions(routineId: number, start: CalendarDate, end: CalendarDate): Promise<CompletionRecord[]> {
    this.assertReady('listCompletions');
    return this.completionsInRange(routineId, start, end).map((record) => ({ ...record }));
  }

  async countCompleted(routineId: number, start: CalendarDate, end: CalendarDate): Promise<number> {
    this.assertReady('countCompleted');
    return this.completionsInRange(routineId, start, end).filter((record) => record.completed).length;
  }

  private completionsInRange(routineId: number, start: CalendarDate, end: CalendarDate): CompletionRecord[] {
    if (start > end) throw invalidRange(start, end);
    this.requireRoutine(routineId);

    return [...this.completions.values()]
      .filter((record) => record.routineId === routineId && record.date >= start && record.date <= end)
      .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  }
}
