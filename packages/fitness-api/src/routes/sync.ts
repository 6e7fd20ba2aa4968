import type { FastifyInstance } from 'fastify';
import type { FitnessCore } from '@fitledger/fitness-core';
import { parseCount } from '../http.js';

// Change-queue inspection for the sync transport
export function registerSyncRoutes(fastify: FastifyInstance, core: FitnessCore): void {
  fastify.get('/sync/stats', async () => {
    return core.changes.stats();
  });

  fastify.get<{ Querystring: { limit?: string } }>('/sync/pending', async request => {
    return { entries: core.changes.pending(parseCount(request.query.limit)) };
  });

  fastify.post('/sync/cleanup', async () => {
    return { removed: core.changes.cleanup() };
  });
}
