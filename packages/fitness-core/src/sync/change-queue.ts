import type Database from 'better-sqlite3';
import {
  SYNC_CONFIG,
  type ChangeQueueEntry,
  type SyncOperation,
  type SyncQueueStats,
} from '@fitledger/shared';
import { toChangeQueueEntry, type SyncQueueRow } from '../db/rows.js';
import { errorMessage } from '../errors.js';
import { moduleLogger } from '../logger.js';

const log = moduleLogger('ChangeQueue');

export type EnqueueResult =
  | { ok: true; entry: ChangeQueueEntry }
  | { ok: false; error: string };

/**
 * Remote side of the sync contract. Implementations apply one entry to the
 * remote store and reject on failure.
 */
export interface SyncTransport {
  push(entry: ChangeQueueEntry): Promise<void>;
}

export interface DrainReport {
  skipped: boolean; // another drain was already running
  synced: number;
  failed: number;
}

/**
 * Local ledger of writes waiting to reach the remote store. Enqueueing never
 * throws: the write that triggered it has already happened locally.
 */
export class ChangeQueue {
  private draining = false;

  constructor(private readonly db: Database.Database) {}

  enqueue(tableName: string, recordId: string | number, operation: SyncOperation): EnqueueResult {
    try {
      const row = this.db
        .prepare(
          `INSERT INTO sync_queue (table_name, record_id, operation, timestamp, synced, retry_count, last_error)
           VALUES (?, ?, ?, ?, 0, 0, NULL)
           ON CONFLICT (table_name, record_id, operation) DO UPDATE SET
             timestamp = excluded.timestamp,
             synced = 0,
             retry_count = 0,
             last_error = NULL
           RETURNING *`
        )
        .get(tableName, String(recordId), operation, Date.now()) as SyncQueueRow;

      log.debug({ tableName, recordId, operation }, 'Added to sync queue');
      return { ok: true, entry: toChangeQueueEntry(row) };
    } catch (error) {
      log.error({ err: error, tableName, recordId, operation }, 'Error adding to sync queue');
      return { ok: false, error: errorMessage(error) };
    }
  }

  /**
   * Unsynced entries, oldest first. Entries past the retry limit are left out.
   */
  pending(limit: number = SYNC_CONFIG.DRAIN_BATCH_SIZE): ChangeQueueEntry[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM sync_queue
         WHERE synced = 0 AND COALESCE(retry_count, 0) <= ?
         ORDER BY timestamp ASC, id ASC
         LIMIT ?`
      )
      .all(SYNC_CONFIG.MAX_RETRIES, limit) as SyncQueueRow[];
    return rows.map(toChangeQueueEntry);
  }

  get(id: number): ChangeQueueEntry | null {
    const row = this.db.prepare('SELECT * FROM sync_queue WHERE id = ?').get(id) as SyncQueueRow | undefined;
    return row ? toChangeQueueEntry(row) : null;
  }

  markSynced(id: number): boolean {
    const result = this.db
      .prepare('UPDATE sync_queue SET synced = 1, last_error = NULL WHERE id = ?')
      .run(id);
    return result.changes > 0;
  }

  markFailed(id: number, error: string): boolean {
    const result = this.db
      .prepare(
        'UPDATE sync_queue SET retry_count = COALESCE(retry_count, 0) + 1, last_error = ? WHERE id = ?'
      )
      .run(error, id);
    return result.changes > 0;
  }

  /**
   * Remove synced entries older than the retention window. Returns the number removed.
   */
  cleanup(now: number = Date.now()): number {
    const result = this.db
      .prepare('DELETE FROM sync_queue WHERE synced = 1 AND timestamp < ?')
      .run(now - SYNC_CONFIG.SYNCED_RETENTION_MS);
    return result.changes;
  }

  stats(): SyncQueueStats {
    const row = this.db
      .prepare(
        `SELECT
           COALESCE(SUM(CASE WHEN synced = 0 THEN 1 ELSE 0 END), 0) AS pending,
           COALESCE(SUM(CASE WHEN synced = 1 THEN 1 ELSE 0 END), 0) AS synced,
           COALESCE(SUM(CASE WHEN synced = 0 AND COALESCE(retry_count, 0) > 0 THEN 1 ELSE 0 END), 0) AS failing
         FROM sync_queue`
      )
      .get() as SyncQueueStats;
    return row;
  }

  /**
   * Hand every pending entry to the transport, oldest first and one batch at a
   * time, marking each synced or failed. An entry is pushed at most once per
   * drain. Only one drain runs at a time.
   */
  async drain(transport: SyncTransport): Promise<DrainReport> {
    if (this.draining) {
      log.info('Drain already in progress, skipping');
      return { skipped: true, synced: 0, failed: 0 };
    }

    this.draining = true;
    const report: DrainReport = { skipped: false, synced: 0, failed: 0 };

    try {
      const attempted: number[] = [];
      for (let batch = this.nextBatch(attempted); batch.length > 0; batch = this.nextBatch(attempted)) {
        for (const entry of batch) {
          attempted.push(entry.id);
          try {
            await transport.push(entry);
            this.markSynced(entry.id);
            report.synced++;
          } catch (error) {
            this.markFailed(entry.id, errorMessage(error));
            report.failed++;
            log.warn({ err: error, entryId: entry.id, tableName: entry.tableName }, 'Sync push failed');
          }
        }
      }

      this.cleanup();
      log.info(report, 'Drain finished');
      return report;
    } finally {
      this.draining = false;
    }
  }

  // Pending entries this drain has not pushed yet; failed ones stay pending
  private nextBatch(attempted: number[]): ChangeQueueEntry[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM sync_queue
         WHERE synced = 0 AND COALESCE(retry_count, 0) <= ?
           AND id NOT IN (SELECT value FROM json_each(?))
         ORDER BY timestamp ASC, id ASC
         LIMIT ?`
      )
      .all(SYNC_CONFIG.MAX_RETRIES, JSON.stringify(attempted), SYNC_CONFIG.DRAIN_BATCH_SIZE) as SyncQueueRow[];
    return rows.map(toChangeQueueEntry);
  }
}
