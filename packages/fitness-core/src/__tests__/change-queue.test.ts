import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SYNC_CONFIG, type ChangeQueueEntry } from '@fitledger/shared';
import { RecordStore } from '../db/store.js';
import type { SyncTransport } from '../sync/change-queue.js';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('ChangeQueue', () => {
  let store: RecordStore;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-03-10T12:00:00Z'));
    store = new RecordStore({ path: ':memory:' });
  });

  afterEach(() => {
    store.close();
    vi.useRealTimers();
  });

  describe('enqueue', () => {
    it('keeps one unsynced row per key with the later timestamp', () => {
      const first = store.changes.enqueue('workout', 7, 'INSERT');
      vi.setSystemTime(new Date('2024-03-10T12:05:00Z'));
      const second = store.changes.enqueue('workout', 7, 'INSERT');

      expect(first.ok).toBe(true);
      expect(second.ok).toBe(true);

      const pending = store.changes.pending();
      expect(pending).toHaveLength(1);
      expect(pending[0]).toMatchObject({
        tableName: 'workout',
        recordId: '7',
        operation: 'INSERT',
        timestamp: new Date('2024-03-10T12:05:00Z').getTime(),
        synced: false,
      });
    });

    it('treats a different operation as a separate entry', () => {
      store.changes.enqueue('workout', 7, 'INSERT');
      store.changes.enqueue('workout', 7, 'DELETE');

      expect(store.changes.pending().map(entry => entry.operation)).toEqual(['INSERT', 'DELETE']);
    });

    it('reopens a synced entry and clears its retry state', () => {
      const result = store.changes.enqueue('goal', 3, 'UPDATE');
      if (!result.ok) throw new Error(result.error);

      store.changes.markFailed(result.entry.id, 'offline');
      store.changes.markSynced(result.entry.id);
      store.changes.enqueue('goal', 3, 'UPDATE');

      expect(store.changes.get(result.entry.id)).toMatchObject({ synced: false, retryCount: 0 });
      expect(store.changes.get(result.entry.id)?.lastError).toBeUndefined();
    });

    it('returns an error instead of throwing', () => {
      store.db.exec('DROP TABLE sync_queue');

      const result = store.changes.enqueue('workout', 1, 'INSERT');

      expect(result.ok).toBe(false);
    });
  });

  describe('retries and cleanup', () => {
    it('leaves entries past the retry limit out of pending', () => {
      const result = store.changes.enqueue('workout', 1, 'INSERT');
      if (!result.ok) throw new Error(result.error);

      for (let attempt = 0; attempt < 6; attempt++) {
        store.changes.markFailed(result.entry.id, 'timeout');
      }

      expect(store.changes.pending()).toEqual([]);
      expect(store.changes.get(result.entry.id)).toMatchObject({ retryCount: 6, lastError: 'timeout' });
    });

    it('removes synced entries older than seven days', () => {
      const old = store.changes.enqueue('workout', 1, 'INSERT');
      vi.setSystemTime(new Date('2024-03-16T12:00:00Z'));
      const recent = store.changes.enqueue('workout', 2, 'INSERT');
      if (!old.ok || !recent.ok) throw new Error('enqueue failed');

      store.changes.markSynced(old.entry.id);
      store.changes.markSynced(recent.entry.id);

      const removed = store.changes.cleanup(new Date('2024-03-10T12:00:00Z').getTime() + 8 * DAY_MS);

      expect(removed).toBe(1);
      expect(store.changes.get(old.entry.id)).toBeNull();
      expect(store.changes.get(recent.entry.id)).not.toBeNull();
    });

    it('counts pending, synced and failing entries', () => {
      const a = store.changes.enqueue('workout', 1, 'INSERT');
      const b = store.changes.enqueue('workout', 2, 'INSERT');
      store.changes.enqueue('workout', 3, 'INSERT');
      if (!a.ok || !b.ok) throw new Error('enqueue failed');

      store.changes.markSynced(a.entry.id);
      store.changes.markFailed(b.entry.id, 'offline');

      expect(store.changes.stats()).toEqual({ pending: 2, synced: 1, failing: 1 });
    });
  });

  describe('drain', () => {
    it('marks pushed entries synced and failed ones for retry', async () => {
      store.changes.enqueue('workout', 1, 'INSERT');
      store.changes.enqueue('workout', 2, 'INSERT');

      const pushed: string[] = [];
      const transport: SyncTransport = {
        push: vi.fn(async (entry: ChangeQueueEntry) => {
          if (entry.recordId === '2') {
            throw new Error('remote rejected');
          }
          pushed.push(entry.recordId);
        }),
      };

      const report = await store.changes.drain(transport);

      expect(report).toEqual({ skipped: false, synced: 1, failed: 1 });
      expect(pushed).toEqual(['1']);
      expect(store.changes.pending()).toEqual([
        expect.objectContaining({ recordId: '2', retryCount: 1, lastError: 'remote rejected' }),
      ]);
    });

    it('pushes entries beyond the first batch, each once', async () => {
      const total = SYNC_CONFIG.DRAIN_BATCH_SIZE + 5;
      for (let record = 1; record <= total; record++) {
        store.changes.enqueue('workout', record, 'INSERT');
      }

      const push = vi.fn(async (entry: ChangeQueueEntry) => {
        if (entry.recordId === '1') {
          throw new Error('remote rejected');
        }
      });

      const report = await store.changes.drain({ push });

      expect(report).toEqual({ skipped: false, synced: total - 1, failed: 1 });
      expect(push).toHaveBeenCalledTimes(total);
      expect(store.changes.stats()).toEqual({ pending: 1, synced: total - 1, failing: 1 });
    });

    it('skips a drain started while another is running', async () => {
      store.changes.enqueue('workout', 1, 'INSERT');

      let release: () => void = () => {};
      const transport: SyncTransport = {
        push: () => new Promise<void>(resolve => {
          release = resolve;
        }),
      };

      const first = store.changes.drain(transport);
      const second = await store.changes.drain(transport);
      release();

      expect(second).toEqual({ skipped: true, synced: 0, failed: 0 });
      expect(await first).toEqual({ skipped: false, synced: 1, failed: 0 });
    });
  });
});
