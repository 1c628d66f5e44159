/**
 * DmoError Tests
 */

import {
  activityNotFound,
  DmoError,
  duplicateName,
  invalidRange,
  isDmoError,
  routineNotFound,
  storageFailure,
  toStorageError,
  validationFailed,
} from '../utils/errors';

describe('DmoError factories', () => {
  it('should build not-found errors', () => {
    const err = routineNotFound(7);
    expect(err).toBeInstanceOf(DmoError);
    expect(err).toBeInstanceOf(Error);
    expect(err.kind).toBe('routine-not-found');
    expect(err.category).toBe('not-found');
    expect(err.details).toEqual({ kind: 'routine-not-found', routineId: 7 });
    expect(err.message).toBe('DMO not found: 7');

    expect(activityNotFound(3).details).toEqual({ kind: 'activity-not-found', activityId: 3 });
  });

  it('should file duplicate names under validation', () => {
    const err = duplicateName('Morning Routine');
    expect(err.kind).toBe('duplicate-name');
    expect(err.category).toBe('validation');
    expect(err.message).toBe("Duplicate DMO name: 'Morning Routine'");
  });

  it('should summarize validation issues in the message', () => {
    const err = validationFailed([
      { path: 'name', message: 'name cannot be empty or whitespace' },
      { path: '', message: 'Required' },
    ]);
    expect(err.message).toBe('Validation failed: name: name cannot be empty or whitespace; Required');
    expect(err.details.issues).toHaveLength(2);
  });

  it('should carry both ends of an invalid range', () => {
    const err = invalidRange('2026-01-05', '2026-01-01');
    expect(err.category).toBe('invalid-range');
    expect(err.details).toEqual({ kind: 'invalid-range', start: '2026-01-05', end: '2026-01-01' });
    expect(err.message).toBe('start (2026-01-05) must be <= end (2026-01-01)');
  });

  it('should widen a specific error to the general type', () => {
    const specific = storageFailure('listRoutines', new Error('disk full'));
    const errors: DmoError[] = [specific, routineNotFound(1), validationFailed([])];
    const general: DmoError = toStorageError('init', new Error('locked'));

    expect(errors.map((err) => err.category)).toEqual(['storage', 'not-found', 'validation']);
    expect(general).toBeInstanceOf(DmoError);
    expect(general.kind).toBe('storage');
  });

  it('should keep the cause and retry flag on storage errors', () => {
    const cause = new Error('disk full');
    const err = storageFailure('createRoutine', cause, true);
    expect(err.message).toBe('Storage operation failed: createRoutine (disk full)');
    expect(err.details.retryable).toBe(true);
    expect(err.details.cause).toBe(cause);
  });
});

describe('isDmoError', () => {
  it('should narrow by kind', () => {
    const err: unknown = routineNotFound(1);
    expect(isDmoError(err)).toBe(true);
    expect(isDmoError(err, 'routine-not-found')).toBe(true);
    expect(isDmoError(err, 'storage')).toBe(false);
  });

  it('should reject plain errors', () => {
    expect(isDmoError(new Error('boom'))).toBe(false);
    expect(isDmoError('boom')).toBe(false);
  });
});

describe('toStorageError', () => {
  it('should pass DmoErrors through unchanged', () => {
    const original = duplicateName('Run');
    expect(toStorageError('createRoutine', original)).toBe(original);
  });

  it('should wrap anything else as non-retryable storage failure', () => {
    const err = toStorageError('listRoutines', 'socket hang up');
    expect(err.kind).toBe('storage');
    expect(err.details).toEqual({
      kind: 'storage',
      operation: 'listRoutines',
      retryable: false,
      cause: 'socket hang up',
    });
  });
});
