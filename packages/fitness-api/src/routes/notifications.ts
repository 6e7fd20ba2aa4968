import type { FastifyInstance } from 'fastify';
import { NotFoundError, type FitnessCore } from '@fitledger/fitness-core';
import { parseId, requestUser } from '../http.js';

export function registerNotificationRoutes(fastify: FastifyInstance, core: FitnessCore): void {
  fastify.get<{ Querystring: { unread?: string } }>('/notifications', async request => {
    const userId = requestUser(request);
    return {
      notifications: core.notifications.list({ userId, unreadOnly: request.query.unread === 'true' }),
      unread: core.notifications.unreadCount(userId),
    };
  });

  fastify.post<{ Params: { id: string } }>('/notifications/:id/read', async request => {
    const userId = requestUser(request);
    const notificationId = parseId(request.params.id);

    const owned = core.notifications.list({ userId }).some(notification => notification.id === notificationId);
    if (!owned || !core.notifications.markRead(notificationId)) {
      throw new NotFoundError('Notification', notificationId);
    }
    return { read: true };
  });

  fastify.post('/notifications/read-all', async request => {
    return { marked: core.notifications.markAllRead(requestUser(request)) };
  });
}
