/**
 * Streak & Completion Rate Calculator
 *
 * Pure functions shared by the monthly report and the range summary.
 * A streak counts consecutive positions in the date list, not calendar
 * distance: callers pass the full day sequence of the period.
 */

import type { CalendarDate, StreakStats } from '../types';

/** Decimal places kept on a completion rate */
export const COMPLETION_RATE_PRECISION = 4;

/**
 * Compute current and longest streaks.
 *
 * - longest: longest run of completed entries anywhere in `allDates`
 * - current: run of completed entries ending at the last date (0 if the
 *   last date is not completed)
 *
 * @param completedDates - Dates marked completed (dates outside `allDates` are ignored)
 * @param allDates - Every date of the period, ascending
 */
export function calculateStreaks(
  completedDates: ReadonlySet<CalendarDate>,
  allDates: readonly CalendarDate[]
): StreakStats {
  if (allDates.length === 0) {
    return { currentStreak: 0, longestStreak: 0 };
  }

  let longestStreak = 0;
  let run = 0;
  for (const date of allDates) {
    if (completedDates.has(date)) {
      run++;
      if (run > longestStreak) longestStreak = run;
    } else {
      run = 0;
    }
  }

  let currentStreak = 0;
  for (let i = allDates.length - 1; i >= 0; i--) {
    if (!completedDates.has(allDates[i])) break;
    currentStreak++;
  }

  return { currentStreak, longestStreak };
}

/**
 * Completed / total, rounded to 4 decimal places. 0 when total is 0.
 *
 * Rounds half to even on the exact quotient, worked in integers so that
 * 1/32 (0.03125) lands on 0.0312 and 3/32 on 0.0938.
 */
export function calculateCompletionRate(completedDays: number, totalDays: number): number {
  if (totalDays <= 0) return 0;
  const factor = 10 ** COMPLETION_RATE_PRECISION;
  const scaled = completedDays * factor;
  let units = Math.floor(scaled / totalDays);
  const twiceRemainder = 2 * (scaled - units * totalDays);
  if (twiceRemainder > totalDays || (twiceRemainder === totalDays && units % 2 === 1)) {
    units++;
  }
  return units / factor;
}
