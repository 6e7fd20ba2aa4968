import type { Notification } from '@fitledger/shared';
import { resolveUserId, type AuthProvider } from '../auth.js';
import type { RecordStore } from '../db/store.js';

/**
 * In-app notification inbox. Rows are written by the goal, streak and ledger
 * services; this only reads them and marks them read.
 */
export class NotificationCenter {
  constructor(
    private readonly store: RecordStore,
    private readonly auth: AuthProvider
  ) {}

  list(options: { unreadOnly?: boolean; userId?: string } = {}): Notification[] {
    return this.store.listNotifications(resolveUserId(this.auth, options.userId), options.unreadOnly ?? false);
  }

  markRead(notificationId: number): boolean {
    return this.store.markNotificationRead(notificationId);
  }

  markAllRead(userId?: string): number {
    return this.store.markAllNotificationsRead(resolveUserId(this.auth, userId));
  }

  unreadCount(userId?: string): number {
    return this.store.countUnreadNotifications(resolveUserId(this.auth, userId));
  }
}
