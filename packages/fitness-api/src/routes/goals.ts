import type { FastifyInstance } from 'fastify';
import { GoalState, type Goal } from '@fitledger/shared';
import {
  NotFoundError,
  ValidationError,
  createGoalSchema,
  parseInput,
  updateGoalSchema,
  type FitnessCore,
} from '@fitledger/fitness-core';
import { parseId, parseCount, requestUser } from '../http.js';

const STATES: Record<string, GoalState> = {
  active: GoalState.Active,
  achieved: GoalState.Achieved,
  expired: GoalState.Expired,
};

function parseState(raw: string | undefined): GoalState | undefined {
  if (raw === undefined) return undefined;
  const state = STATES[raw];
  if (state === undefined) {
    throw new ValidationError(`Unknown goal state: ${raw}`);
  }
  return state;
}

function ownedGoal(core: FitnessCore, goalId: number, userId: string): Goal {
  const goal = core.goals.getGoal(goalId);
  if (!goal || goal.userId !== userId) {
    throw new NotFoundError('Goal', goalId);
  }
  return goal;
}

export function registerGoalRoutes(fastify: FastifyInstance, core: FitnessCore): void {
  fastify.get<{ Querystring: { state?: string } }>('/goals', async request => {
    const userId = requestUser(request);
    return { goals: core.goals.listGoals(userId, parseState(request.query.state)) };
  });

  fastify.get('/goals/near-completion', async request => {
    return { goals: core.goals.nearCompletionGoals(requestUser(request)) };
  });

  fastify.get<{ Querystring: { days?: string } }>('/goals/expiring', async request => {
    const userId = requestUser(request);
    return { goals: core.goals.expiringGoals(parseCount(request.query.days), userId) };
  });

  fastify.post('/goals', async (request, reply) => {
    const userId = requestUser(request);
    const input = parseInput(createGoalSchema, request.body);

    const { value: goal, failures } = await core.goals.createGoal({ ...input, userId });
    return reply.code(201).send({ goal, failures });
  });

  fastify.get<{ Params: { id: string } }>('/goals/:id', async request => {
    return { goal: ownedGoal(core, parseId(request.params.id), requestUser(request)) };
  });

  fastify.patch<{ Params: { id: string } }>('/goals/:id', async request => {
    const goalId = parseId(request.params.id);
    ownedGoal(core, goalId, requestUser(request));

    const { value: goal, failures } = await core.goals.updateGoal(goalId, parseInput(updateGoalSchema, request.body));
    return { goal, failures };
  });

  fastify.delete<{ Params: { id: string } }>('/goals/:id', async request => {
    const goalId = parseId(request.params.id);
    ownedGoal(core, goalId, requestUser(request));

    const { value: deleted, failures } = await core.goals.deleteGoal(goalId);
    return { deleted, failures };
  });
}
