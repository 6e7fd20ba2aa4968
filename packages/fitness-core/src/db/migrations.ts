import type Database from 'better-sqlite3';
import { TABLES } from '@fitledger/shared';
import { GOAL_TABLE_SQL, columnNames, hasColumn, indexExists, tableSql } from './schema.js';
import { errorMessage } from '../errors.js';
import { moduleLogger } from '../logger.js';

const log = moduleLogger('migrations');

export interface Migration {
  version: number;
  name: string;
  /** Inspects the live schema; a step whose change is already present is skipped. */
  isNeeded(db: Database.Database): boolean;
  up(db: Database.Database): void;
}

export interface MigrationReport {
  applied: string[];
  skipped: string[];
  failed: Array<{ name: string; error: string }>;
}

function addColumn(db: Database.Database, table: string, definition: string): void {
  db.exec(`ALTER TABLE ${table} ADD COLUMN ${definition}`);
}

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'daily-log-notes',
    isNeeded: db => !hasColumn(db, TABLES.DAILY_LOG, 'notes'),
    up: db => addColumn(db, TABLES.DAILY_LOG, 'notes TEXT'),
  },
  {
    version: 2,
    name: 'streak-last-workout-date',
    isNeeded: db => !hasColumn(db, TABLES.STREAK, 'last_workout_date'),
    up: db => {
      addColumn(db, TABLES.STREAK, 'last_workout_date DATE');
      db.exec(`
        UPDATE streak SET last_workout_date = (
          SELECT MAX(d.date) FROM daily_log d
          WHERE d.user_id = streak.user_id AND d.activity_type = 'workout'
        )
      `);
    },
  },
  {
    version: 3,
    name: 'goal-weight-columns',
    isNeeded: db =>
      !hasColumn(db, TABLES.GOAL, 'starting_weight') || !hasColumn(db, TABLES.GOAL, 'achieved_date'),
    up: db => {
      if (!hasColumn(db, TABLES.GOAL, 'starting_weight')) {
        addColumn(db, TABLES.GOAL, 'starting_weight REAL');
      }
      if (!hasColumn(db, TABLES.GOAL, 'achieved_date')) {
        addColumn(db, TABLES.GOAL, 'achieved_date DATE');
        db.exec('UPDATE goal SET achieved_date = end_date WHERE achieved = 1');
      }
    },
  },
  {
    // A CHECK constraint cannot be altered in place, so the table is rebuilt.
    version: 4,
    name: 'goal-weight-target-kind',
    isNeeded: db => !(tableSql(db, TABLES.GOAL) ?? '').includes('WeightTarget'),
    up: db => {
      db.exec('ALTER TABLE goal RENAME TO goal_legacy');
      db.exec(GOAL_TABLE_SQL);

      const target = new Set(columnNames(db, TABLES.GOAL));
      const shared = columnNames(db, 'goal_legacy').filter(name => target.has(name));
      const columns = shared.join(', ');
      db.exec(`INSERT INTO goal (${columns}) SELECT ${columns} FROM goal_legacy`);

      const { legacy } = db.prepare('SELECT COUNT(*) AS legacy FROM goal_legacy').get() as { legacy: number };
      const { copied } = db.prepare('SELECT COUNT(*) AS copied FROM goal').get() as { copied: number };
      if (copied !== legacy) {
        throw new Error(`goal rebuild copied ${copied} of ${legacy} rows`);
      }

      db.exec('DROP TABLE goal_legacy');
      db.exec('CREATE INDEX IF NOT EXISTS idx_goal_user ON goal(user_id, achieved)');
    },
  },
  {
    version: 5,
    name: 'sync-queue-retry-columns',
    isNeeded: db =>
      !hasColumn(db, TABLES.SYNC_QUEUE, 'retry_count') || !hasColumn(db, TABLES.SYNC_QUEUE, 'last_error'),
    up: db => {
      if (!hasColumn(db, TABLES.SYNC_QUEUE, 'retry_count')) {
        addColumn(db, TABLES.SYNC_QUEUE, 'retry_count INTEGER DEFAULT 0');
      }
      if (!hasColumn(db, TABLES.SYNC_QUEUE, 'last_error')) {
        addColumn(db, TABLES.SYNC_QUEUE, 'last_error TEXT');
      }
    },
  },
  {
    version: 6,
    name: 'workout-set-number-unique',
    isNeeded: db => !indexExists(db, 'idx_workout_set_number'),
    up: db => {
      db.exec('CREATE UNIQUE INDEX idx_workout_set_number ON workout_set(workout_exercise_id, set_number)');
    },
  },
];

/**
 * Apply every needed migration in version order. Each step runs in its own
 * transaction; a failing step is rolled back, logged and skipped so the store
 * stays usable with whatever schema it reached.
 */
export function runMigrations(db: Database.Database, migrations: Migration[] = MIGRATIONS): MigrationReport {
  const report: MigrationReport = { applied: [], skipped: [], failed: [] };
  const ordered = [...migrations].sort((a, b) => a.version - b.version);
  const record = db.prepare(
    'INSERT OR REPLACE INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)'
  );

  for (const migration of ordered) {
    try {
      if (!migration.isNeeded(db)) {
        report.skipped.push(migration.name);
        continue;
      }

      db.transaction(() => {
        migration.up(db);
        record.run(migration.version, migration.name, new Date().toISOString());
      })();

      log.info({ version: migration.version }, `Applied migration ${migration.name}`);
      report.applied.push(migration.name);
    } catch (error) {
      log.error({ err: error, version: migration.version }, `Migration ${migration.name} failed`);
      report.failed.push({ name: migration.name, error: errorMessage(error) });
    }
  }

  return report;
}
