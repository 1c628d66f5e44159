/**
 * DMO Service
 *
 * Facade over one StorageBackend. Validates every input with zod before
 * storage sees it, then delegates. Reports are assembled here from
 * storage snapshots and handed to the pure report engine.
 */

import { z } from 'zod';

import type {
  Activity,
  ActivityCreate,
  ActivityUpdate,
  CalendarDate,
  CompletionRecord,
  DailyReport,
  ListRoutinesOptions,
  MonthlyReport,
  Routine,
  RoutineCreate,
  RoutineSummary,
  RoutineUpdate,
} from '../types';
import { buildDailyReport, buildMonthlyReport, buildRoutineSummary, type DailySnapshot } from '../reports/reportEngine';
import type { StorageBackend } from '../storage/backend';
import { monthBounds } from '../utils/dates';
import { invalidRange, validationFailed } from '../utils/errors';
import { createLogger, type Logger } from '../utils/logger';
import {
  activityCreateSchema,
  activityUpdateSchema,
  calendarDateSchema,
  completionNoteSchema,
  entityIdSchema,
  parseInput,
  routineCreateSchema,
  routineUpdateSchema,
  yearMonthSchema,
} from '../utils/validation';

export interface DmoServiceOptions {
  logger?: Logger;
}

const activityIdListSchema = z.array(entityIdSchema);

export class DmoService {
  private readonly log: Logger;

  constructor(
    readonly backend: StorageBackend,
    options: DmoServiceOptions = {}
  ) {
    this.log = options.logger ?? createLogger('dmoService');
  }

  // ============================================
  // Routines
  // ============================================

  async createRoutine(data: RoutineCreate): Promise<Routine> {
    const input = parseInput(routineCreateSchema, data);
    return this.backend.createRoutine(input);
  }

  async getRoutine(routineId: number): Promise<Routine> {
    return this.backend.getRoutine(parseInput(entityIdSchema, routineId, 'routineId'));
  }

  async listRoutines(options: ListRoutinesOptions = {}): Promise<Routine[]> {
    return this.backend.listRoutines({ includeInactive: options.includeInactive === true });
  }

  async updateRoutine(routineId: number, patch: RoutineUpdate): Promise<Routine> {
    const id = parseInput(entityIdSchema, routineId, 'routineId');
    const input = parseInput(routineUpdateSchema, patch);
    return this.backend.updateRoutine(id, input);
  }

  async deleteRoutine(routineId: number): Promise<void> {
    await this.backend.deleteRoutine(parseInput(entityIdSchema, routineId, 'routineId'));
  }

  /** Idempotent: activating an active routine leaves it untouched. */
  async activateRoutine(routineId: number): Promise<Routine> {
    return this.setActive(routineId, true);
  }

  /** Idempotent: deactivating an inactive routine leaves it untouched. */
  async deactivateRoutine(routineId: number): Promise<Routine> {
    return this.setActive(routineId, false);
  }

  private async setActive(routineId: number, active: boolean): Promise<Routine> {
    const id = parseInput(entityIdSchema, routineId, 'routineId');
    const routine = await this.backend.getRoutine(id);
    if (routine.active === active) return routine;
    return this.backend.updateRoutine(id, { active });
  }

  // ============================================
  // Activities
  // ============================================

  async createActivity(data: ActivityCreate): Promise<Activity> {
    const input = parseInput(activityCreateSchema, data);
    return this.backend.createActivity(input);
  }

  async getActivity(activityId: number): Promise<Activity> {
    return this.backend.getActivity(parseInput(entityIdSchema, activityId, 'activityId'));
  }

  async listActivities(routineId: number): Promise<Activity[]> {
    return this.backend.listActivities(parseInput(entityIdSchema, routineId, 'routineId'));
  }

  async updateActivity(activityId: number, patch: ActivityUpdate): Promise<Activity> {
    const id = parseInput(entityIdSchema, activityId, 'activityId');
    const input = parseInput(activityUpdateSchema, patch);
    return this.backend.updateActivity(id, input);
  }

  async deleteActivity(activityId: number): Promise<void> {
    await this.backend.deleteActivity(parseInput(entityIdSchema, activityId, 'activityId'));
  }

  /**
   * Give each activity its index in `activityIds` as its order.
   * All ids are checked before anything is written.
   * @returns The routine's activities, re-listed
   */
  async reorderActivities(routineId: number, activityIds: number[]): Promise<Activity[]> {
    const id = parseInput(entityIdSchema, routineId, 'routineId');
    const ids = parseInput(activityIdListSchema, activityIds, 'activityIds');

    if (new Set(ids).size !== ids.length) {
      throw validationFailed([{ path: 'activityIds', message: 'must not contain duplicates' }]);
    }

    await this.backend.getRoutine(id);
    for (const activityId of ids) {
      const activity = await this.backend.getActivity(activityId);
      if (activity.routineId !== id) {
        throw validationFailed([
          { path: 'activityIds', message: `activity ${activityId} does not belong to DMO ${id}` },
        ]);
      }
    }

    for (const [index, activityId] of ids.entries()) {
      await this.backend.updateActivity(activityId, { order: index });
    }
    return this.backend.listActivities(id);
  }

  // ============================================
  // Completions
  // ============================================

  async setCompletion(
    routineId: number,
    date: CalendarDate,
    completed: boolean,
    note?: string | null
  ): Promise<CompletionRecord> {
    const id = parseInput(entityIdSchema, routineId, 'routineId');
    const day = parseInput(calendarDateSchema, date, 'date');
    const flag = parseInput(z.boolean(), completed, 'completed');
    const text = parseInput(completionNoteSchema, note, 'note');
    return this.backend.setCompletion(id, day, flag, text ?? null);
  }

  async markComplete(routineId: number, date: CalendarDate, note?: string | null): Promise<CompletionRecord> {
    return this.setCompletion(routineId, date, true, note);
  }

  async markIncomplete(routineId: number, date: CalendarDate, note?: string | null): Promise<CompletionRecord> {
    return this.setCompletion(routineId, date, false, note);
  }

  async getCompletion(routineId: number, date: CalendarDate): Promise<CompletionRecord | null> {
    const id = parseInput(entityIdSchema, routineId, 'routineId');
    const day = parseInput(calendarDateSchema, date, 'date');
    return this.backend.getCompletion(id, day);
  }

  async listCompletions(routineId: number, start: CalendarDate, end: CalendarDate): Promise<CompletionRecord[]> {
    const [id, from, to] = this.parseRange(routineId, start, end);
    return this.backend.listCompletions(id, from, to);
  }

  async countCompleted(routineId: number, start: CalendarDate, end: CalendarDate): Promise<number> {
    const [id, from, to] = this.parseRange(routineId, start, end);
    return this.backend.countCompleted(id, from, to);
  }

  private parseRange(routineId: number, start: CalendarDate, end: CalendarDate): [number, CalendarDate, CalendarDate] {
    return [
      parseInput(entityIdSchema, routineId, 'routineId'),
      parseInput(calendarDateSchema, start, 'start'),
      parseInput(calendarDateSchema, end, 'end'),
    ];
  }

  // ============================================
  // Reports
  // ============================================

  /**
   * Status of every active routine on one date, in name order.
   */
  async getDailyReport(date: CalendarDate): Promise<DailyReport> {
    const day = parseInput(calendarDateSchema, date, 'date');
    const routines = await this.backend.listRoutines();

    const snapshots: DailySnapshot[] = [];
    for (const routine of routines) {
      snapshots.push({
        routine,
        completion: await this.backend.getCompletion(routine.id, day),
        activities: await this.backend.listActivities(routine.id),
      });
    }

    this.log.debug({ date: day, routines: snapshots.length }, '[dmoService] Daily report built');
    return buildDailyReport(day, snapshots);
  }

  /**
   * One report per routine: the given routine (active or not), or every
   * active routine when `routineId` is omitted.
   */
  async getMonthlyReport(year: number, month: number, routineId?: number): Promise<MonthlyReport[]> {
    const period = parseInput(yearMonthSchema, { year, month });
    const routines =
      routineId === undefined
        ? await this.backend.listRoutines()
        : [await this.backend.getRoutine(parseInput(entityIdSchema, routineId, 'routineId'))];

    const { start, end } = monthBounds(period.year, period.month);
    const reports: MonthlyReport[] = [];
    for (const routine of routines) {
      const completions = await this.backend.listCompletions(routine.id, start, end);
      reports.push(buildMonthlyReport(routine, period.year, period.month, completions));
    }

    this.log.debug(
      { year: period.year, month: period.month, routines: reports.length },
      '[dmoService] Monthly report built'
    );
    return reports;
  }

  async getRoutineSummary(routineId: number, start: CalendarDate, end: CalendarDate): Promise<RoutineSummary> {
    const [id, from, to] = this.parseRange(routineId, start, end);
    if (from > to) throw invalidRange(from, to);

    const routine = await this.backend.getRoutine(id);
    const completions = await this.backend.listCompletions(id, from, to);

    this.log.debug({ routineId: id, start: from, end: to }, '[dmoService] Summary built');
    return buildRoutineSummary(routine, from, to, completions);
  }
}
