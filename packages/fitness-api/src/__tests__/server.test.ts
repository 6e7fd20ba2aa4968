import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createFitnessCore, type FitnessCore } from '@fitledger/fitness-core';
import { buildServer } from '../server.js';

const TOKEN = 'test-secret';

function headers(userId?: string): Record<string, string> {
  const base: Record<string, string> = { authorization: `Bearer ${TOKEN}` };
  if (userId) {
    base['x-user-id'] = userId;
  }
  return base;
}

describe('fitness API', () => {
  let core: FitnessCore;
  let fastify: FastifyInstance;

  async function signIn(id: string): Promise<void> {
    await fastify.inject({
      method: 'POST',
      url: '/api/fitness/session',
      headers: headers(),
      payload: { id, firstName: 'Test', lastName: 'User' },
    });
  }

  async function saveWorkout(userId: string, date: string, weight: number) {
    return fastify.inject({
      method: 'POST',
      url: '/api/fitness/workouts',
      headers: headers(userId),
      payload: { date, exercises: [{ exerciseId: 1, sets: [{ setNumber: 1, reps: 5, weight }] }] },
    });
  }

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-03-10T12:00:00'));
    core = createFitnessCore({ path: ':memory:' });
    fastify = await buildServer(core, { token: TOKEN });
  });

  afterEach(async () => {
    await fastify.close();
    core.close();
    vi.useRealTimers();
  });

  describe('access', () => {
    it('serves /health without a token', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'ok', service: 'fitness-api', failedMigrations: [] });
    });

    it('rejects requests without the bearer token', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/api/fitness/exercises' });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({ error: 'Unauthorized' });
    });

    it('answers 401 for per-user routes without a user header', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/api/fitness/streak', headers: headers() });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({ error: 'User not logged in', code: 'NOT_LOGGED_IN' });
    });

    it('answers an empty streak for a user with nothing logged', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/api/fitness/streak', headers: headers('ghost') });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ streak: { userId: 'ghost', currentStreak: 0, longestStreak: 0 } });
    });
  });

  describe('session and catalog', () => {
    it('creates the user on first sign-in', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/fitness/session',
        headers: headers(),
        payload: { id: 'user-1', firstName: 'Test', lastName: 'User', heightCm: 180 },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        user: { id: 'user-1', firstName: 'Test', heightCm: 180 },
        failures: [],
      });

      const me = await fastify.inject({ method: 'GET', url: '/api/fitness/me', headers: headers('user-1') });
      expect(me.json().user.id).toBe('user-1');
    });

    it('rejects an incomplete sign-in payload', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/fitness/session',
        headers: headers(),
        payload: { id: 'user-1' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().code).toBe('VALIDATION_ERROR');
    });

    it('lists the seeded exercises by muscle group', async () => {
      const response = await fastify.inject({
        method: 'GET',
        url: '/api/fitness/exercises?muscleGroup=Chest',
        headers: headers(),
      });

      const names = response.json().exercises.map((exercise: { name: string }) => exercise.name);
      expect(names).toContain('Bench Press');
    });
  });

  describe('workouts', () => {
    beforeEach(async () => {
      await signIn('user-1');
    });

    it('saves a workout and reads it back', async () => {
      const saved = await saveWorkout('user-1', '2024-03-10', 60);

      expect(saved.statusCode).toBe(201);
      const { workoutId, personalBests, failures } = saved.json();
      expect(personalBests).toEqual([]);
      expect(failures).toEqual([]);

      const read = await fastify.inject({
        method: 'GET',
        url: `/api/fitness/workouts/${workoutId}`,
        headers: headers('user-1'),
      });
      expect(read.statusCode).toBe(200);
      expect(read.json().workout).toMatchObject({ id: workoutId, userId: 'user-1', date: '2024-03-10' });
      expect(read.json().workout.exercises[0].exercise.name).toBe('Bench Press');
    });

    it('returns the personal best from the second heavier save', async () => {
      await saveWorkout('user-1', '2024-03-09', 60);
      const response = await saveWorkout('user-1', '2024-03-10', 65);

      expect(response.json().personalBests).toEqual([expect.objectContaining({ exerciseId: 1, value: 65 })]);
    });

    it('answers 400 for duplicate set numbers', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/fitness/workouts',
        headers: headers('user-1'),
        payload: {
          date: '2024-03-10',
          exercises: [
            {
              exerciseId: 1,
              sets: [
                { setNumber: 1, reps: 5, weight: 60 },
                { setNumber: 1, reps: 5, weight: 60 },
              ],
            },
          ],
        },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().code).toBe('VALIDATION_ERROR');
      expect(response.json().error).toContain('Duplicate set number 1 for exercise 1');
    });

    it('hides workouts of other users', async () => {
      const saved = await saveWorkout('user-1', '2024-03-10', 60);

      const response = await fastify.inject({
        method: 'GET',
        url: `/api/fitness/workouts/${saved.json().workoutId}`,
        headers: headers('user-2'),
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        error: `Workout ${saved.json().workoutId} not found`,
        code: 'NOT_FOUND',
      });
    });

    it('answers 400 for a malformed id', async () => {
      const response = await fastify.inject({
        method: 'GET',
        url: '/api/fitness/workouts/abc',
        headers: headers('user-1'),
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('Invalid id: abc');
    });

    it('deletes a workout and queues the delete', async () => {
      const saved = await saveWorkout('user-1', '2024-03-10', 60);
      const workoutId = saved.json().workoutId;

      const response = await fastify.inject({
        method: 'DELETE',
        url: `/api/fitness/workouts/${workoutId}`,
        headers: headers('user-1'),
      });

      expect(response.json()).toEqual({ deleted: true, failures: [] });

      const pending = await fastify.inject({ method: 'GET', url: '/api/fitness/sync/pending', headers: headers() });
      const workoutOps = pending
        .json()
        .entries.filter((entry: { tableName: string }) => entry.tableName === 'workout')
        .map((entry: { operation: string }) => entry.operation);
      expect(workoutOps).toEqual(['INSERT', 'DELETE']);
    });

    it('filters the list by date range', async () => {
      await saveWorkout('user-1', '2024-03-01', 60);
      await saveWorkout('user-1', '2024-03-05', 60);

      const response = await fastify.inject({
        method: 'GET',
        url: '/api/fitness/workouts?start=2024-03-02&end=2024-03-10',
        headers: headers('user-1'),
      });

      expect(response.json().workouts.map((workout: { date: string }) => workout.date)).toEqual(['2024-03-05']);
    });
  });

  describe('goals and streaks', () => {
    beforeEach(async () => {
      await signIn('user-1');
    });

    it('achieves a frequency goal through saved workouts', async () => {
      const created = await fastify.inject({
        method: 'POST',
        url: '/api/fitness/goals',
        headers: headers('user-1'),
        payload: { kind: 'WorkoutFrequency', targetValue: 2, endDate: '2024-03-31' },
      });
      expect(created.statusCode).toBe(201);

      await saveWorkout('user-1', '2024-03-10', 40);
      await saveWorkout('user-1', '2024-03-10', 40);

      const achieved = await fastify.inject({
        method: 'GET',
        url: '/api/fitness/goals?state=achieved',
        headers: headers('user-1'),
      });
      expect(achieved.json().goals).toEqual([
        expect.objectContaining({ id: created.json().goal.id, currentProgress: 2, achievedDate: '2024-03-10' }),
      ]);

      const inbox = await fastify.inject({ method: 'GET', url: '/api/fitness/notifications', headers: headers('user-1') });
      expect(inbox.json().notifications.map((notification: { message: string }) => notification.message)).toEqual([
        "Congratulations! You've reached your workout frequency goal!",
      ]);
      expect(inbox.json().unread).toBe(1);
    });

    it('rejects an unknown goal state filter', async () => {
      const response = await fastify.inject({
        method: 'GET',
        url: '/api/fitness/goals?state=paused',
        headers: headers('user-1'),
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('Unknown goal state: paused');
    });

    it('counts a rest day toward the streak', async () => {
      await saveWorkout('user-1', '2024-03-08', 40);

      const rest = await fastify.inject({
        method: 'POST',
        url: '/api/fitness/rest-days',
        headers: headers('user-1'),
        payload: { date: '2024-03-09' },
      });
      expect(rest.json().streak).toMatchObject({ currentStreak: 2, lastWorkoutDate: '2024-03-08' });

      await saveWorkout('user-1', '2024-03-10', 40);
      const streak = await fastify.inject({ method: 'GET', url: '/api/fitness/streak', headers: headers('user-1') });
      expect(streak.json().streak).toMatchObject({ currentStreak: 3, longestStreak: 3 });
    });

    it('expires overdue goals during maintenance', async () => {
      const created = await fastify.inject({
        method: 'POST',
        url: '/api/fitness/goals',
        headers: headers('user-1'),
        payload: { kind: 'WorkoutFrequency', targetValue: 5, startDate: '2024-03-01', endDate: '2024-03-05' },
      });

      const response = await fastify.inject({
        method: 'POST',
        url: '/api/fitness/maintenance',
        headers: headers('user-1'),
      });

      expect(response.json().goals).toEqual({ expired: [created.json().goal.id], achieved: [], updated: [] });
      expect(response.json().streak).toMatchObject({ currentStreak: 0 });
    });

    it('records body weight', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/fitness/body-weight',
        headers: headers('user-1'),
        payload: { weightKg: 82.4, measuredAt: '2024-03-10T07:30:00Z' },
      });

      expect(response.statusCode).toBe(201);
      expect(response.json().metric).toMatchObject({ weightKg: 82.4, measuredAt: '2024-03-10T07:30:00.000Z' });
    });
  });
});
