import { StaticAuthProvider } from '../auth.js';
import { createFitnessCore, type FitnessCore } from '../core.js';

export const TEST_USER = 'user-1';

export function createTestCore(userId: string | null = TEST_USER): FitnessCore {
  return createFitnessCore({ path: ':memory:', auth: new StaticAuthProvider(userId) });
}

export async function signIn(core: FitnessCore, id: string = TEST_USER): Promise<void> {
  await core.accounts.signIn({ id, firstName: 'Test', lastName: 'User' });
}

export function exerciseId(core: FitnessCore, name: string): number {
  const exercise = core.store.listExercises().find(entry => entry.name === name);
  if (!exercise) {
    throw new Error(`Exercise ${name} is not seeded`);
  }
  return exercise.id;
}

/** One exercise, one set, for payloads where only the weight matters. */
export function singleSet(exercise: number, weight: number, reps = 5) {
  return [{ exerciseId: exercise, sets: [{ setNumber: 1, reps, weight }] }];
}
