/**
 * DMO Core Type Definitions
 *
 * Routines ("DMOs"), their activity checklists, the completion ledger,
 * and the report shapes derived from it.
 */

// === Calendar ===

/** Calendar date without a time component, formatted `YYYY-MM-DD`. */
export type CalendarDate = string;

// === Routines ===

export interface Routine {
  id: number;
  name: string;
  description: string | null;
  timezone: string | null;
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface RoutineCreate {
  name: string;
  description?: string | null;
  timezone?: string | null;
}

/** Merge-patch: keys left undefined are not touched. */
export interface RoutineUpdate {
  name?: string;
  description?: string;
  timezone?: string;
  active?: boolean;
}

export interface ListRoutinesOptions {
  includeInactive?: boolean;
}

// === Activities ===

export interface Activity {
  id: number;
  routineId: number;
  name: string;
  order: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface ActivityCreate {
  routineId: number;
  name: string;
  order?: number;
}

export interface ActivityUpdate {
  name?: string;
  order?: number;
}

// === Completions ===

export interface CompletionRecord {
  id: number;
  routineId: number;
  date: CalendarDate;
  completed: boolean;
  note: string | null;
  createdAt: Date;
  updatedAt: Date;
}

// === Reports ===

export interface DailyRoutineStatus {
  routine: Routine;
  completed: boolean;
  note: string | null;
  /** Activity names, in checklist order */
  activities: string[];
}

export interface DailyReport {
  date: CalendarDate;
  routines: DailyRoutineStatus[];
}

export interface DayCompletion {
  date: CalendarDate;
  completed: boolean;
  note: string | null;
}

export interface StreakStats {
  currentStreak: number;
  longestStreak: number;
}

export interface MonthSummary extends StreakStats {
  totalDays: number;
  completedDays: number;
  completionRate: number;
  missedDays: CalendarDate[];
}

export interface MonthlyReport {
  routine: Routine;
  year: number;
  month: number;
  days: DayCompletion[];
  summary: MonthSummary;
}

export interface RoutineSummary extends StreakStats {
  routine: Routine;
  startDate: CalendarDate;
  endDate: CalendarDate;
  totalDays: number;
  completedDays: number;
  completionRate: number;
}
