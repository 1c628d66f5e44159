/**
 * Input Validation
 *
 * zod schemas for everything a caller hands the service layer.
 * Strings are trimmed before their length is checked, so "  Run  "
 * and "Run" are the same routine name.
 */

import { z } from 'zod';
import { isCalendarDate } from './dates';
import { validationFailed, type ValidationIssue } from './errors';

export const ROUTINE_NAME_MAX = 255;
export const ACTIVITY_NAME_MAX = 500;
export const DESCRIPTION_MAX = 2000;
export const NOTE_MAX = 2000;
export const TIMEZONE_MAX = 50;

const requiredName = (max: number) =>
  z.string().trim().min(1, 'name cannot be empty or whitespace').max(max);

export const entityIdSchema = z.number().int().positive();

export const calendarDateSchema = z
  .string()
  .refine(isCalendarDate, { message: 'must be a valid YYYY-MM-DD date' });

export const completionNoteSchema = z.string().max(NOTE_MAX).nullish();

export const routineCreateSchema = z.object({
  name: requiredName(ROUTINE_NAME_MAX),
  description: z.string().trim().max(DESCRIPTION_MAX).nullish(),
  timezone: z.string().trim().max(TIMEZONE_MAX).nullish(),
});

export const routineUpdateSchema = z.object({
  name: requiredName(ROUTINE_NAME_MAX).optional(),
  description: z.string().trim().max(DESCRIPTION_MAX).optional(),
  timezone: z.string().trim().max(TIMEZONE_MAX).optional(),
  active: z.boolean().optional(),
});

export const activityCreateSchema = z.object({
  routineId: entityIdSchema,
  name: requiredName(ACTIVITY_NAME_MAX),
  order: z.number().int().min(0).default(0),
});

export const activityUpdateSchema = z.object({
  name: requiredName(ACTIVITY_NAME_MAX).optional(),
  order: z.number().int().min(0).optional(),
});

export const yearMonthSchema = z.object({
  year: z.number().int().min(1).max(9999),
  month: z.number().int().min(1).max(12),
});

/**
 * Flatten zod issues into `{ path, message }` pairs.
 */
export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Parse `input` or throw a DmoError of kind `validation`.
 * @param label - Path prefix for issues on scalar inputs (e.g. "date")
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown, label = ''): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = toValidationIssues(result.error).map((issue) => ({
      ...issue,
      path: [label, issue.path].filter(Boolean).join('.'),
    }));
    throw validationFailed(issues);
  }
  return result.data;
}
