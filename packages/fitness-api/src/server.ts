import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { SERVER_CONFIG } from '@fitledger/shared';
import type { FitnessCore } from '@fitledger/fitness-core';
import { statusFor } from './http.js';
import { registerAccountRoutes } from './routes/accounts.js';
import { registerActivityRoutes } from './routes/activity.js';
import { registerGoalRoutes } from './routes/goals.js';
import { registerNotificationRoutes } from './routes/notifications.js';
import { registerSyncRoutes } from './routes/sync.js';
import { registerWorkoutRoutes } from './routes/workouts.js';

export interface ServerOptions {
  logger?: FastifyServerOptions['logger'];
  /** Bearer token required on every route but /health. Unset disables the check. */
  token?: string;
}

export async function buildServer(core: FitnessCore, options: ServerOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: options.logger ?? false });

  await fastify.register(cors, {
    origin: true,
    credentials: true,
  });

  const authToken = options.token;
  if (authToken) {
    fastify.addHook('onRequest', async (request, reply) => {
      if (request.url === '/health') return;
      const token = request.headers.authorization?.replace('Bearer ', '');
      if (token !== authToken) {
        return reply.code(401).send({ error: 'Unauthorized' });
      }
    });
  }

  fastify.setErrorHandler((error, request, reply) => {
    const status = statusFor(error);
    if (status >= 500) {
      request.log.error({ err: error }, 'Request failed');
    }
    return reply.code(status).send({
      error: error.message,
      code: error.code,
    });
  });

  fastify.get('/health', async () => {
    const { failed } = core.store.migrationReport;
    return {
      status: failed.length === 0 ? 'ok' : 'degraded',
      service: 'fitness-api',
      failedMigrations: failed,
      timestamp: new Date().toISOString(),
    };
  });

  await fastify.register(
    async api => {
      registerAccountRoutes(api, core);
      registerWorkoutRoutes(api, core);
      registerGoalRoutes(api, core);
      registerActivityRoutes(api, core);
      registerNotificationRoutes(api, core);
      registerSyncRoutes(api, core);
    },
    { prefix: SERVER_CONFIG.API_PREFIX }
  );

  return fastify;
}
