import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FitnessCore } from '../core.js';
import { createTestCore, exerciseId, signIn } from './helpers.js';

describe('two workouts on consecutive days', () => {
  let core: FitnessCore;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-03-10T12:00:00'));
    core = createTestCore('user-u');
  });

  afterEach(() => {
    core.close();
    vi.useRealTimers();
  });

  it('records one personal best and a two-day streak', async () => {
    await signIn(core, 'user-u');
    const exercise = exerciseId(core, 'Deadlift');

    const first = await core.workouts.saveCompleteWorkout({
      date: '2024-03-09',
      exercises: [{ exerciseId: exercise, sets: [{ setNumber: 1, reps: 10, weight: 80 }] }],
    });
    const second = await core.workouts.saveCompleteWorkout({
      date: '2024-03-10',
      exercises: [{ exerciseId: exercise, sets: [{ setNumber: 1, reps: 8, weight: 85 }] }],
    });

    expect(first.failures).toEqual([]);
    expect(second.failures).toEqual([]);

    const personalBests = core.store.listMilestones('user-u', 'PersonalBest');
    expect(personalBests).toHaveLength(1);
    expect(personalBests[0]).toMatchObject({ exerciseId: exercise, value: 85 });

    expect(core.streaks.getStreak()).toMatchObject({ currentStreak: 2, longestStreak: 2 });
  });

  it('fails per-user operations without a signed-in user', async () => {
    const anonymous = createTestCore(null);

    expect(() => anonymous.streaks.getStreak()).toThrow('User not logged in');
    await expect(anonymous.streaks.logRest('2024-03-10')).rejects.toThrow('User not logged in');
    anonymous.close();
  });
});
