/**
 * Streak Calculator Tests
 */

import { calculateCompletionRate, calculateStreaks } from '../utils/streaks';
import { dateRange } from '../utils/dates';

const JAN_1_TO_5 = dateRange('2026-01-01', '2026-01-05');

describe('calculateStreaks', () => {
  it('should return zeros for an empty period', () => {
    expect(calculateStreaks(new Set(), [])).toEqual({ currentStreak: 0, longestStreak: 0 });
  });

  it('should count the run ending at the last date as current', () => {
    const completed = new Set(['2026-01-01', '2026-01-02', '2026-01-04', '2026-01-05']);
    expect(calculateStreaks(completed, JAN_1_TO_5)).toEqual({ currentStreak: 2, longestStreak: 2 });
  });

  it('should report no current streak when the last date is missed', () => {
    const completed = new Set(['2026-01-01', '2026-01-02', '2026-01-03']);
    expect(calculateStreaks(completed, JAN_1_TO_5)).toEqual({ currentStreak: 0, longestStreak: 3 });
  });

  it('should equal the period length when every day is completed', () => {
    expect(calculateStreaks(new Set(JAN_1_TO_5), JAN_1_TO_5)).toEqual({ currentStreak: 5, longestStreak: 5 });
  });

  it('should ignore completed dates outside the period', () => {
    const completed = new Set(['2025-12-31', '2026-01-06']);
    expect(calculateStreaks(completed, JAN_1_TO_5)).toEqual({ currentStreak: 0, longestStreak: 0 });
  });

  it('should keep current <= longest <= total days', () => {
    const all = dateRange('2026-03-01', '2026-03-31');
    const completed = new Set(all.filter((_, index) => index % 3 !== 0));
    const { currentStreak, longestStreak } = calculateStreaks(completed, all);

    expect(currentStreak).toBeLessThanOrEqual(longestStreak);
    expect(longestStreak).toBeLessThanOrEqual(all.length);
    // index 30 is a multiple of 3, so the last day is missed
    expect(currentStreak).toBe(0);
    expect(longestStreak).toBe(2);
  });
});

describe('calculateCompletionRate', () => {
  it('should be 0 when there are no days', () => {
    expect(calculateCompletionRate(0, 0)).toBe(0);
  });

  it('should round to four decimal places', () => {
    expect(calculateCompletionRate(4, 5)).toBe(0.8);
    expect(calculateCompletionRate(8, 28)).toBe(0.2857);
    expect(calculateCompletionRate(2, 3)).toBe(0.6667);
    expect(calculateCompletionRate(1, 3)).toBe(0.3333);
  });

  it('should round exact ties to the even digit', () => {
    expect(calculateCompletionRate(1, 32)).toBe(0.0312);
    expect(calculateCompletionRate(3, 32)).toBe(0.0938);
    expect(calculateCompletionRate(5, 32)).toBe(0.1562);
    expect(calculateCompletionRate(7, 32)).toBe(0.2188);
  });

  it('should be 1 for a perfect period', () => {
    expect(calculateCompletionRate(31, 31)).toBe(1);
  });
});
