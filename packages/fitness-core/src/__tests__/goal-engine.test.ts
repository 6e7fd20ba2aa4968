import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { GoalState, type Goal } from '@fitledger/shared';
import type { FitnessCore } from '../core.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { completion, isTargetReached } from '../services/goal-engine.js';
import { createGoalSchema, parseInput } from '../validation.js';
import { TEST_USER, createTestCore, exerciseId, signIn, singleSet } from './helpers.js';

function goal(overrides: Partial<Goal>): Goal {
  return {
    id: 1,
    userId: TEST_USER,
    kind: 'WorkoutFrequency',
    startDate: '2024-03-01',
    endDate: '2024-03-31',
    state: GoalState.Active,
    currentProgress: 0,
    ...overrides,
  };
}

describe('isTargetReached', () => {
  it('compares counts and lifts against the target', () => {
    expect(isTargetReached(goal({ targetValue: 3 }), 2)).toBe(false);
    expect(isTargetReached(goal({ targetValue: 3 }), 3)).toBe(true);
    expect(isTargetReached(goal({ kind: 'ExerciseTarget', exerciseId: 1, targetValue: 100 }), 100.5)).toBe(true);
  });

  it('follows the direction of a weight goal', () => {
    const loss = goal({ kind: 'WeightTarget', startingValue: 82, targetValue: 78 });
    const gain = goal({ kind: 'WeightTarget', startingValue: 60, targetValue: 65 });
    const hold = goal({ kind: 'WeightTarget', startingValue: 70, targetValue: 70 });

    expect(isTargetReached(loss, 79)).toBe(false);
    expect(isTargetReached(loss, 78)).toBe(true);
    expect(isTargetReached(gain, 64)).toBe(false);
    expect(isTargetReached(gain, 65.2)).toBe(true);
    expect(isTargetReached(hold, 70)).toBe(true);
    expect(isTargetReached(hold, 70.4)).toBe(false);
  });

  it('treats a missing or zero target as met', () => {
    expect(isTargetReached(goal({}), 0)).toBe(true);
    expect(isTargetReached(goal({ targetValue: 0 }), 0)).toBe(true);
  });
});

describe('completion', () => {
  it('measures weight goals from the starting value', () => {
    expect(completion(goal({ kind: 'WeightTarget', startingValue: 82, targetValue: 78, currentProgress: 79 }))).toBe(
      0.75
    );
    expect(completion(goal({ kind: 'WeightTarget', startingValue: 82, targetValue: 78, currentProgress: 84 }))).toBe(0);
  });

  it('clamps to the range 0..1', () => {
    expect(completion(goal({ targetValue: 4, currentProgress: 1 }))).toBe(0.25);
    expect(completion(goal({ targetValue: 4, currentProgress: 6 }))).toBe(1);
  });
});

describe('GoalEngine', () => {
  let core: FitnessCore;
  let bench: number;

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-03-10T12:00:00'));
    core = createTestCore();
    await signIn(core);
    bench = exerciseId(core, 'Bench Press');
  });

  afterEach(() => {
    core.close();
    vi.useRealTimers();
  });

  async function saveWorkout(date: string, weight?: number): Promise<number> {
    const outcome = await core.workouts.saveCompleteWorkout({
      date,
      exercises: weight === undefined ? [] : singleSet(bench, weight),
    });
    return outcome.value.workoutId;
  }

  describe('createGoal', () => {
    it('rejects an exercise goal without an exercise', () => {
      const input: unknown = { kind: 'ExerciseTarget', targetValue: 100, endDate: '2024-04-01' };

      expect(() => parseInput(createGoalSchema, input)).toThrow(ValidationError);
      expect(() => parseInput(createGoalSchema, input)).toThrow('ExerciseTarget goals need an exerciseId');
    });

    it('rejects an exercise id on other kinds', () => {
      const input: unknown = { kind: 'WorkoutFrequency', exerciseId: bench, targetValue: 3, endDate: '2024-04-01' };

      expect(() => parseInput(createGoalSchema, input)).toThrow('exerciseId is only allowed on ExerciseTarget goals');
    });

    it('rejects an unknown exercise', async () => {
      await expect(
        core.goals.createGoal({ kind: 'ExerciseTarget', exerciseId: 9999, targetValue: 10, endDate: '2024-04-01' })
      ).rejects.toThrow('Unknown exercise 9999');
    });

    it('rejects an end date before the start date', async () => {
      await expect(
        core.goals.createGoal({ kind: 'WorkoutFrequency', targetValue: 3, startDate: '2024-03-10', endDate: '2024-03-01' })
      ).rejects.toThrow('endDate 2024-03-01 is before startDate 2024-03-10');
    });

    it('starts from the current progress source', async () => {
      await saveWorkout('2024-03-02');
      await saveWorkout('2024-03-04');

      const { value } = await core.goals.createGoal({
        kind: 'WorkoutFrequency',
        targetValue: 5,
        startDate: '2024-03-01',
        endDate: '2024-03-31',
      });

      expect(value).toMatchObject({ state: GoalState.Active, currentProgress: 2, startDate: '2024-03-01' });
      expect(core.changes.pending()).toContainEqual(
        expect.objectContaining({ tableName: 'goal', recordId: String(value.id), operation: 'INSERT' })
      );
    });

    it('achieves a zero-target goal immediately', async () => {
      const { value } = await core.goals.createGoal({ kind: 'WorkoutFrequency', targetValue: 0, endDate: '2024-03-31' });

      expect(value.state).toBe(GoalState.Achieved);
      expect(value.achievedDate).toBe('2024-03-10');
    });

    it('needs a starting weight for weight goals', async () => {
      await expect(core.goals.createGoal({ kind: 'WeightTarget', targetValue: 75, endDate: '2024-06-01' })).rejects.toThrow(
        'WeightTarget goals need a startingValue or a logged body weight'
      );
    });
  });

  describe('workout frequency', () => {
    it('tracks the workout count through saves and deletes', async () => {
      const { value: created } = await core.goals.createGoal({
        kind: 'WorkoutFrequency',
        targetValue: 10,
        startDate: '2024-03-01',
        endDate: '2024-03-31',
      });

      await saveWorkout('2024-02-20');
      const first = await saveWorkout('2024-03-02');
      await saveWorkout('2024-03-05');
      await saveWorkout('2024-03-09');
      await core.workouts.deleteWorkout(first);

      const stored = core.goals.getGoal(created.id);
      expect(stored?.currentProgress).toBe(2);
      expect(stored?.currentProgress).toBe(core.store.countWorkoutsInRange(TEST_USER, '2024-03-01', '2024-03-31'));
    });

    it('achieves once with a milestone and a notification', async () => {
      const { value: created } = await core.goals.createGoal({
        kind: 'WorkoutFrequency',
        targetValue: 2,
        startDate: '2024-03-01',
        endDate: '2024-03-31',
      });

      await saveWorkout('2024-03-08');
      await saveWorkout('2024-03-09');
      await saveWorkout('2024-03-10');

      expect(core.goals.getGoal(created.id)).toMatchObject({
        state: GoalState.Achieved,
        currentProgress: 2,
        achievedDate: '2024-03-10',
      });
      expect(core.store.listMilestones(TEST_USER, 'GoalAchieved')).toEqual([
        expect.objectContaining({ value: 2, date: '2024-03-10' }),
      ]);
      expect(core.notifications.list().filter(n => n.kind === 'GoalProgress').map(n => n.message)).toEqual([
        "Congratulations! You've reached your workout frequency goal!",
      ]);
    });
  });

  describe('exercise target', () => {
    it('follows new personal bests for the bound exercise', async () => {
      const { value: created } = await core.goals.createGoal({
        kind: 'ExerciseTarget',
        exerciseId: bench,
        targetValue: 100,
        endDate: '2024-04-30',
      });

      await saveWorkout('2024-03-08', 90);
      expect(core.goals.getGoal(created.id)).toMatchObject({ state: GoalState.Active, currentProgress: 90 });

      await saveWorkout('2024-03-09', 102.5);
      expect(core.goals.getGoal(created.id)).toMatchObject({ state: GoalState.Achieved, currentProgress: 102.5 });
      expect(core.notifications.list().map(n => n.message)).toContain(
        "Congratulations! You've reached your Bench Press goal!"
      );
    });

    it('ignores personal bests after achievement', async () => {
      const { value: created } = await core.goals.createGoal({
        kind: 'ExerciseTarget',
        exerciseId: bench,
        targetValue: 50,
        endDate: '2024-04-30',
      });

      await saveWorkout('2024-03-08', 55);
      await saveWorkout('2024-03-09', 60);
      const outcome = await core.goals.onPersonalBest(bench, 70);

      expect(outcome.value).toEqual([]);
      expect(core.goals.getGoal(created.id)?.currentProgress).toBe(55);
      expect(core.store.listMilestones(TEST_USER, 'GoalAchieved')).toHaveLength(1);
    });
  });

  describe('weight target', () => {
    it('achieves a loss goal once the measurement reaches the target', async () => {
      await core.goals.logBodyWeight(82, '2024-03-01T08:00:00.000Z');
      const { value: created } = await core.goals.createGoal({
        kind: 'WeightTarget',
        targetValue: 78,
        endDate: '2024-06-01',
      });
      expect(created).toMatchObject({ startingValue: 82, currentProgress: 82 });

      await core.goals.logBodyWeight(79, '2024-03-05T08:00:00.000Z');
      const halfway = core.goals.getGoal(created.id);
      expect(halfway?.state).toBe(GoalState.Active);
      expect(halfway && completion(halfway)).toBe(0.75);

      await core.goals.logBodyWeight(77.5, '2024-03-09T08:00:00.000Z');
      expect(core.goals.getGoal(created.id)?.state).toBe(GoalState.Achieved);
    });

    it('achieves a gain goal from an explicit starting value', async () => {
      const { value: created } = await core.goals.createGoal({
        kind: 'WeightTarget',
        targetValue: 65,
        startingValue: 60,
        endDate: '2024-06-01',
      });

      await core.goals.logBodyWeight(66);

      expect(core.goals.getGoal(created.id)?.state).toBe(GoalState.Achieved);
    });
  });

  describe('performDailyMaintenance', () => {
    it('expires goals past their end date for good', async () => {
      const { value: created } = await core.goals.createGoal({
        kind: 'WorkoutFrequency',
        targetValue: 5,
        startDate: '2024-03-01',
        endDate: '2024-03-05',
      });

      const first = await core.goals.performDailyMaintenance();
      const second = await core.goals.performDailyMaintenance();
      await saveWorkout('2024-03-03');

      expect(first.value.expired).toEqual([created.id]);
      expect(second.value.expired).toEqual([]);
      expect(core.goals.getGoal(created.id)).toMatchObject({ state: GoalState.Expired, currentProgress: 0 });
      expect(core.store.listMilestones(TEST_USER)).toEqual([]);
    });

    it('keeps achieved goals achieved after the end date', async () => {
      const { value: created } = await core.goals.createGoal({
        kind: 'WorkoutFrequency',
        targetValue: 1,
        startDate: '2024-03-01',
        endDate: '2024-03-05',
      });
      await saveWorkout('2024-03-02');

      const report = await core.goals.performDailyMaintenance();

      expect(report.value.expired).toEqual([]);
      expect(core.goals.getGoal(created.id)?.state).toBe(GoalState.Achieved);
    });

    it('refreshes weight goals from the latest measurement', async () => {
      const { value: created } = await core.goals.createGoal({
        kind: 'WeightTarget',
        targetValue: 70,
        startingValue: 80,
        endDate: '2024-06-01',
      });
      core.store.insertBodyWeight(TEST_USER, 76, '2024-03-09T07:00:00.000Z');

      const report = await core.goals.performDailyMaintenance();

      expect(report.value).toEqual({ expired: [], achieved: [], updated: [created.id] });
      expect(core.goals.getGoal(created.id)?.currentProgress).toBe(76);
    });
  });

  describe('editing and queries', () => {
    it('re-evaluates after lowering the target', async () => {
      await saveWorkout('2024-03-02');
      const { value: created } = await core.goals.createGoal({
        kind: 'WorkoutFrequency',
        targetValue: 4,
        startDate: '2024-03-01',
        endDate: '2024-03-31',
      });

      const { value: updated } = await core.goals.updateGoal(created.id, { targetValue: 1 });

      expect(updated).toMatchObject({ targetValue: 1, state: GoalState.Achieved });
    });

    it('refuses to edit finished or missing goals', async () => {
      const { value: done } = await core.goals.createGoal({ kind: 'WorkoutFrequency', targetValue: 0, endDate: '2024-03-31' });

      await expect(core.goals.updateGoal(done.id, { targetValue: 3 })).rejects.toBeInstanceOf(ValidationError);
      await expect(core.goals.updateGoal(999, { targetValue: 3 })).rejects.toBeInstanceOf(NotFoundError);
    });

    it('deletes a goal and queues the delete', async () => {
      const { value: created } = await core.goals.createGoal({ kind: 'WorkoutFrequency', targetValue: 3, endDate: '2024-03-31' });

      expect((await core.goals.deleteGoal(created.id)).value).toBe(true);
      expect((await core.goals.deleteGoal(created.id)).value).toBe(false);
      expect(core.goals.getGoal(created.id)).toBeNull();
      expect(core.changes.pending()).toContainEqual(
        expect.objectContaining({ tableName: 'goal', recordId: String(created.id), operation: 'DELETE' })
      );
    });

    it('finds goals close to completion or to their end date', async () => {
      for (const date of ['2024-03-02', '2024-03-03', '2024-03-04']) {
        await saveWorkout(date);
      }
      const near = await core.goals.createGoal({ kind: 'WorkoutFrequency', targetValue: 3.2, startDate: '2024-03-01', endDate: '2024-03-12' });
      const far = await core.goals.createGoal({ kind: 'WorkoutFrequency', targetValue: 10, startDate: '2024-03-01', endDate: '2024-03-20' });

      expect(core.goals.nearCompletionGoals().map(g => g.id)).toEqual([near.value.id]);
      expect(core.goals.expiringGoals().map(g => g.id)).toEqual([near.value.id]);
      expect(core.goals.expiringGoals(10).map(g => g.id)).toEqual([near.value.id, far.value.id]);
    });
  });
});
