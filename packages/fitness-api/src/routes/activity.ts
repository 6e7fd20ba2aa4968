import type { FastifyInstance } from 'fastify';
import {
  activityDaySchema,
  bodyWeightSchema,
  dateRangeSchema,
  milestoneKindSchema,
  parseInput,
  type FitnessCore,
} from '@fitledger/fitness-core';
import { requestUser } from '../http.js';

export function registerActivityRoutes(fastify: FastifyInstance, core: FitnessCore): void {
  // Body weight

  fastify.get('/body-weight', async request => {
    return { metrics: core.goals.bodyWeightHistory(requestUser(request)) };
  });

  fastify.post('/body-weight', async (request, reply) => {
    const userId = requestUser(request);
    const { weightKg, measuredAt } = parseInput(bodyWeightSchema, request.body);

    const { value: metric, failures } = await core.goals.logBodyWeight(weightKg, measuredAt, userId);
    return reply.code(201).send({ metric, failures });
  });

  // Streak

  fastify.post('/rest-days', async request => {
    const userId = requestUser(request);
    const { date } = parseInput(activityDaySchema, request.body ?? {});

    const { value: streak, failures } = await core.streaks.logRest(date ?? new Date(), userId);
    return { streak, failures };
  });

  fastify.get('/streak', async request => {
    return { streak: core.streaks.getStreak(requestUser(request)) };
  });

  fastify.get('/streak/history', async request => {
    const userId = requestUser(request);
    const { start, end } = parseInput(dateRangeSchema, request.query);
    return { logs: core.streaks.history(start, end, userId) };
  });

  fastify.post('/streak/backfill', async request => {
    const userId = requestUser(request);
    const { start, end } = parseInput(dateRangeSchema, request.body);

    const { value: written, failures } = await core.streaks.backfillFromWorkouts(start, end, userId);
    return { written, failures };
  });

  fastify.get<{ Querystring: { kind?: string } }>('/milestones', async request => {
    const userId = requestUser(request);
    const kind = request.query.kind === undefined ? undefined : parseInput(milestoneKindSchema, request.query.kind);
    return { milestones: core.store.listMilestones(userId, kind) };
  });

  // Daily upkeep, run once per app start or day change
  fastify.post('/maintenance', async request => {
    const userId = requestUser(request);

    const goals = await core.goals.performDailyMaintenance(userId);
    const streak = await core.streaks.performDailyCheck(userId);
    return { goals: goals.value, streak, failures: goals.failures };
  });
}
