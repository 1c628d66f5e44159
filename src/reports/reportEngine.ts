/**
 * Report Engine
 *
 * Pure builders for daily reports, monthly reports and range summaries.
 * Callers fetch the snapshots (routines, activities, completions); nothing
 * in here touches storage or keeps state between calls.
 *
 * Missing completion records count as "not completed".
 */

import type {
  Activity,
  CalendarDate,
  CompletionRecord,
  DailyReport,
  DailyRoutineStatus,
  DayCompletion,
  MonthlyReport,
  Routine,
  RoutineSummary,
} from '../types';
import { dateRange, monthBounds } from '../utils/dates';
import { calculateCompletionRate, calculateStreaks } from '../utils/streaks';

export interface DailySnapshot {
  routine: Routine;
  completion: CompletionRecord | null;
  activities: Activity[];
}

/**
 * One line per active routine, in the order given.
 */
export function buildDailyReport(date: CalendarDate, snapshots: DailySnapshot[]): DailyReport {
  const routines: DailyRoutineStatus[] = snapshots
    .filter(({ routine }) => routine.active)
    .map(({ routine, completion, activities }) => ({
      routine,
      completed: completion?.completed ?? false,
      note: completion?.note ?? null,
      activities: activities.map((activity) => activity.name),
    }));

  return { date, routines };
}

interface PeriodBreakdown {
  days: DayCompletion[];
  completedDates: Set<CalendarDate>;
  missedDays: CalendarDate[];
}

/**
 * Walk every date of the period once, joining it with its record.
 */
function breakDownPeriod(allDates: CalendarDate[], completions: CompletionRecord[]): PeriodBreakdown {
  const byDate = new Map<CalendarDate, CompletionRecord>();
  for (const record of completions) {
    byDate.set(record.date, record);
  }

  const days: DayCompletion[] = [];
  const completedDates = new Set<CalendarDate>();
  const missedDays: CalendarDate[] = [];

  for (const date of allDates) {
    const record = byDate.get(date);
    const completed = record?.completed ?? false;

    days.push({ date, completed, note: record?.note ?? null });
    if (completed) completedDates.add(date);
    else missedDays.push(date);
  }

  return { days, completedDates, missedDays };
}

/**
 * Day-by-day report for one routine over a calendar month.
 * @param completions - The routine's records for that month (extra dates are ignored)
 */
export function buildMonthlyReport(
  routine: Routine,
  year: number,
  month: number,
  completions: CompletionRecord[]
): MonthlyReport {
  const { start, end } = monthBounds(year, month);
  const allDates = dateRange(start, end);
  const { days, completedDates, missedDays } = breakDownPeriod(allDates, completions);
  const streaks = calculateStreaks(completedDates, allDates);

  return {
    routine,
    year,
    month,
    days,
    summary: {
      totalDays: allDates.length,
      completedDays: completedDates.size,
      completionRate: calculateCompletionRate(completedDates.size, allDates.length),
      currentStreak: streaks.currentStreak,
      longestStreak: streaks.longestStreak,
      missedDays,
    },
  };
}

/**
 * Totals and streaks for one routine over an inclusive date range.
 */
export function buildRoutineSummary(
  routine: Routine,
  startDate: CalendarDate,
  endDate: CalendarDate,
  completions: CompletionRecord[]
): RoutineSummary {
  const allDates = dateRange(startDate, endDate);
  const { completedDates } = breakDownPeriod(allDates, completions);
  const streaks = calculateStreaks(completedDates, allDates);

  return {
    routine,
    startDate,
    endDate,
    totalDays: allDates.length,
    completedDays: completedDates.size,
    completionRate: calculateCompletionRate(completedDates.size, allDates.length),
    currentStreak: streaks.currentStreak,
    longestStreak: streaks.longestStreak,
  };
}
