/**
 * Cross-Engine Parity
 *
 * One script of writes, played against each engine. Everything read back
 * afterwards must match exactly once timestamps are set aside.
 */

import type { StorageBackend } from '../storage/backend';
import type { DmoErrorKind } from '../utils/errors';
import { isDmoError } from '../utils/errors';
import { createTestBackend } from './helpers/backends';

interface Timestamped {
  createdAt: Date;
  updatedAt: Date;
}

function withoutTimestamps<T extends Timestamped>(record: T): Omit<T, keyof Timestamped> {
  const { createdAt: _createdAt, updatedAt: _updatedAt, ...rest } = record;
  return rest;
}

async function errorKindOf(promise: Promise<unknown>): Promise<DmoErrorKind | null> {
  try {
    await promise;
    return null;
  } catch (err) {
    if (isDmoError(err)) return err.kind;
    throw err;
  }
}

async function playScript(backend: StorageBackend) {
  const morning = await backend.createRoutine({ name: 'Morning Routine', description: 'Start the day' });
  const evening = await backend.createRoutine({ name: 'Evening Review' });
  await backend.createActivity({ routineId: morning.id, name: 'Meditate', order: 0 });
  const exercise = await backend.createActivity({ routineId: morning.id, name: 'Exercise', order: 1 });
  await backend.setCompletion(morning.id, '2026-02-01', true, 'good');
  await backend.setCompletion(morning.id, '2026-02-01', false, null);
  await backend.setCompletion(morning.id, '2026-02-02', true);
  await backend.updateRoutine(evening.id, { active: false });
  const duplicate = await errorKindOf(backend.createRoutine({ name: 'Morning Routine' }));
  await backend.deleteActivity(exercise.id);

  return {
    duplicate,
    routines: (await backend.listRoutines({ includeInactive: true })).map(withoutTimestamps),
    activeRoutines: (await backend.listRoutines()).map((routine) => routine.name),
    activities: (await backend.listActivities(morning.id)).map(withoutTimestamps),
    completions: (await backend.listCompletions(morning.id, '2026-02-01', '2026-02-28')).map(withoutTimestamps),
    completedCount: await backend.countCompleted(morning.id, '2026-02-01', '2026-02-28'),
    missing: await errorKindOf(backend.getActivity(exercise.id)),
  };
}

type ScriptOutput = Awaited<ReturnType<typeof playScript>>;

async function runOn(kind: 'memory' | 'sqlite' | 'postgres'): Promise<ScriptOutput> {
  const backend = createTestBackend(kind);
  await backend.init();
  try {
    return await playScript(backend);
  } finally {
    await backend.close();
  }
}

describe('cross-engine parity', () => {
  let reference: ScriptOutput;

  beforeAll(async () => {
    reference = await runOn('memory');
  });

  it('should produce the expected reference output', () => {
    expect(reference).toEqual({
      duplicate: 'duplicate-name',
      routines: [
        { id: 2, name: 'Evening Review', description: null, timezone: null, active: false },
        { id: 1, name: 'Morning Routine', description: 'Start the day', timezone: null, active: true },
      ],
      activeRoutines: ['Morning Routine'],
      activities: [{ id: 1, routineId: 1, name: 'Meditate', order: 0 }],
      completions: [
        { id: 1, routineId: 1, date: '2026-02-01', completed: false, note: null },
        { id: 2, routineId: 1, date: '2026-02-02', completed: true, note: null },
      ],
      completedCount: 1,
      missing: 'activity-not-found',
    });
  });

  it.each(['sqlite', 'postgres'] as const)('should match the memory engine on %s', async (kind) => {
    expect(await runOn(kind)).toEqual(reference);
  });
});
