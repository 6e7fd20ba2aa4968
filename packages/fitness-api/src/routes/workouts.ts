import type { FastifyInstance } from 'fastify';
import type { WorkoutDetail } from '@fitledger/shared';
import {
  NotFoundError,
  dateRangeSchema,
  parseInput,
  saveWorkoutSchema,
  updateWorkoutSchema,
  type FitnessCore,
} from '@fitledger/fitness-core';
import { parseId, requestUser } from '../http.js';

interface IdParams {
  id: string;
}

interface RangeQuery {
  start?: string;
  end?: string;
}

function ownedWorkout(core: FitnessCore, workoutId: number, userId: string): WorkoutDetail {
  const workout = core.workouts.getWorkout(workoutId);
  if (!workout || workout.userId !== userId) {
    throw new NotFoundError('Workout', workoutId);
  }
  return workout;
}

export function registerWorkoutRoutes(fastify: FastifyInstance, core: FitnessCore): void {
  fastify.get<{ Querystring: { muscleGroup?: string } }>('/exercises', async request => {
    return { exercises: core.store.listExercises(request.query.muscleGroup) };
  });

  fastify.get('/exercises/muscle-groups', async () => {
    return { muscleGroups: core.store.listMuscleGroups() };
  });

  fastify.get<{ Params: IdParams }>('/exercises/:id/progress', async request => {
    const userId = requestUser(request);
    return { progress: core.workouts.exerciseProgress(parseId(request.params.id), userId) };
  });

  fastify.get('/personal-bests', async request => {
    return { personalBests: core.workouts.personalBests(requestUser(request)) };
  });

  fastify.get<{ Querystring: RangeQuery }>('/workouts', async request => {
    const userId = requestUser(request);
    const { start, end } = request.query;
    const range = start === undefined && end === undefined ? undefined : parseInput(dateRangeSchema, { start, end });
    return { workouts: core.workouts.listWorkouts(userId, range) };
  });

  fastify.post('/workouts', async (request, reply) => {
    const userId = requestUser(request);
    const input = parseInput(saveWorkoutSchema, request.body);

    const { value, failures } = await core.workouts.saveCompleteWorkout({ ...input, userId });
    return reply.code(201).send({ ...value, failures });
  });

  fastify.get<{ Params: IdParams }>('/workouts/:id', async request => {
    const workout = ownedWorkout(core, parseId(request.params.id), requestUser(request));
    return { workout };
  });

  fastify.patch<{ Params: IdParams }>('/workouts/:id', async request => {
    const workoutId = parseId(request.params.id);
    ownedWorkout(core, workoutId, requestUser(request));

    const workout = await core.workouts.updateWorkoutDetails(workoutId, parseInput(updateWorkoutSchema, request.body));
    return { workout };
  });

  fastify.delete<{ Params: IdParams }>('/workouts/:id', async request => {
    const workoutId = parseId(request.params.id);
    ownedWorkout(core, workoutId, requestUser(request));

    const { value: deleted, failures } = await core.workouts.deleteWorkout(workoutId);
    return { deleted, failures };
  });
}
