/**
 * DMO Errors
 *
 * One error class for the whole core. The `kind` discriminant and the
 * matching `details` payload replace a subclass per failure, so callers
 * can `switch` exhaustively on `err.details.kind`.
 *
 * Backends translate driver errors into `storage` errors at their boundary;
 * nothing driver-specific escapes a backend method.
 */

import type { CalendarDate } from '../types';

export type DmoErrorCategory = 'not-found' | 'validation' | 'invalid-range' | 'storage';

export interface ValidationIssue {
  path: string;
  message: string;
}

export type DmoErrorDetails =
  | { kind: 'routine-not-found'; routineId: number }
  | { kind: 'activity-not-found'; activityId: number }
  | { kind: 'duplicate-name'; entity: 'routine'; name: string }
  | { kind: 'validation'; issues: ValidationIssue[] }
  | { kind: 'invalid-range'; start: CalendarDate; end: CalendarDate }
  | { kind: 'storage'; operation: string; retryable: boolean; cause: unknown };

export type DmoErrorKind = DmoErrorDetails['kind'];

type DetailsOf<K extends DmoErrorKind> = DmoErrorDetails & { kind: K };

function categoryOf(kind: DmoErrorKind): DmoErrorCategory {
  switch (kind) {
    case 'routine-not-found':
    case 'activity-not-found':
      return 'not-found';
    case 'duplicate-name':
    case 'validation':
      return 'validation';
    case 'invalid-range':
      return 'invalid-range';
    case 'storage':
      return 'storage';
  }
}

export class DmoError<K extends DmoErrorKind = DmoErrorKind> extends Error {
  readonly details: DetailsOf<K>;

  constructor(details: DetailsOf<K>, message: string) {
    super(message);
    this.name = 'DmoError';
    this.details = details;
  }

  get kind(): DmoErrorKind {
    return this.details.kind;
  }

  get category(): DmoErrorCategory {
    return categoryOf(this.details.kind);
  }
}

// ============================================
// Factories
// ============================================

export function routineNotFound(routineId: number): DmoError<'routine-not-found'> {
  return new DmoError<'routine-not-found'>({ kind: 'routine-not-found', routineId }, `DMO not found: ${routineId}`);
}

export function activityNotFound(activityId: number): DmoError<'activity-not-found'> {
  return new DmoError<'activity-not-found'>({ kind: 'activity-not-found', activityId }, `Activity not found: ${activityId}`);
}

export function duplicateName(name: string): DmoError<'duplicate-name'> {
  return new DmoError<'duplicate-name'>({ kind: 'duplicate-name', entity: 'routine', name }, `Duplicate DMO name: '${name}'`);
}

export function validationFailed(issues: ValidationIssue[]): DmoError<'validation'> {
  const summary = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
  return new DmoError<'validation'>({ kind: 'validation', issues }, `Validation failed: ${summary}`);
}

export function invalidRange(start: CalendarDate, end: CalendarDate): DmoError<'invalid-range'> {
  return new DmoError<'invalid-range'>({ kind: 'invalid-range', start, end }, `start (${start}) must be <= end (${end})`);
}

export function storageFailure(operation: string, cause: unknown, retryable = false): DmoError<'storage'> {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new DmoError<'storage'>(
    { kind: 'storage', operation, retryable, cause },
    `Storage operation failed: ${operation} (${reason})`,
  );
}

// ============================================
// Guards
// ============================================

export function isDmoError(err: unknown): err is DmoError;
export function isDmoError<K extends DmoErrorKind>(err: unknown, kind: K): err is DmoError<K>;
export function isDmoError(err: unknown, kind?: DmoErrorKind): boolean {
  if (!(err instanceof DmoError)) return false;
  return kind === undefined || err.kind === kind;
}

/**
 * Wrap anything that is not already a DmoError as a storage failure.
 */
export function toStorageError(operation: string, err: unknown, retryable = false): DmoError {
  if (err instanceof DmoError) return err;
  return storageFailure(operation, err, retryable);
}
