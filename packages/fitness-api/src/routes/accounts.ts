import type { FastifyInstance } from 'fastify';
import { NotFoundError, parseInput, signInSchema, type FitnessCore } from '@fitledger/fitness-core';
import { requestUser } from '../http.js';

export function registerAccountRoutes(fastify: FastifyInstance, core: FitnessCore): void {
  // Called by the shell after the external sign-in succeeds
  fastify.post('/session', async request => {
    const { value: user, failures } = await core.accounts.signIn(parseInput(signInSchema, request.body));
    return { user, failures };
  });

  fastify.get('/me', async request => {
    const userId = requestUser(request);
    const user = core.accounts.getUser(userId);
    if (!user) {
      throw new NotFoundError('User', userId);
    }
    return { user };
  });
}
