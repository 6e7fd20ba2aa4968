import type Database from 'better-sqlite3';

// Current shape of every table. Older databases reach this shape through MIGRATIONS.
export const GOAL_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS goal (
    goal_id          INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id          TEXT NOT NULL,
    type             TEXT NOT NULL CHECK (type IN ('ExerciseTarget','WorkoutFrequency','WeightTarget')),
    exercise_id      INTEGER,
    target_value     REAL,
    start_date       DATE NOT NULL,
    end_date         DATE NOT NULL,
    achieved         INTEGER NOT NULL DEFAULT 0 CHECK (achieved IN (0, 1, 2)),
    current_progress REAL DEFAULT 0,
    starting_weight  REAL,
    achieved_date    DATE,
    FOREIGN KEY (user_id) REFERENCES users(user_id),
    FOREIGN KEY (exercise_id) REFERENCES exercise(exercise_id),
    CHECK (
      (type = 'ExerciseTarget' AND exercise_id IS NOT NULL) OR
      (type != 'ExerciseTarget' AND exercise_id IS NULL)
    )
  );
`;

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS users (
    user_id           TEXT PRIMARY KEY,
    first_name        TEXT NOT NULL,
    last_name         TEXT NOT NULL,
    height_cm         REAL CHECK (height_cm > 0),
    registration_date DATETIME DEFAULT CURRENT_TIMESTAMP,
    last_login        DATETIME
  );

  CREATE TABLE IF NOT EXISTS user_metrics (
    metric_id   INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id     TEXT NOT NULL,
    weight_kg   REAL CHECK (weight_kg > 0),
    measured_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (user_id) REFERENCES users(user_id)
  );

  CREATE TABLE IF NOT EXISTS exercise (
    exercise_id  INTEGER PRIMARY KEY AUTOINCREMENT,
    name         TEXT NOT NULL,
    muscle_group TEXT,
    description  TEXT
  );

  CREATE TABLE IF NOT EXISTS workout (
    workout_id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id    TEXT NOT NULL,
    date       DATE NOT NULL,
    duration   INT CHECK (duration IS NULL OR duration > 0),
    notes      TEXT,
    FOREIGN KEY (user_id) REFERENCES users(user_id)
  );

  CREATE TABLE IF NOT EXISTS workout_exercise (
    workout_exercise_id INTEGER PRIMARY KEY AUTOINCREMENT,
    workout_id          INTEGER NOT NULL,
    exercise_id         INTEGER NOT NULL,
    FOREIGN KEY (workout_id) REFERENCES workout(workout_id),
    FOREIGN KEY (exercise_id) REFERENCES exercise(exercise_id)
  );

  CREATE TABLE IF NOT EXISTS workout_set (
    workout_set_id       INTEGER PRIMARY KEY AUTOINCREMENT,
    workout_exercise_id  INTEGER NOT NULL,
    set_number           INT NOT NULL CHECK (set_number > 0),
    reps                 INT,
    weight               REAL,
    FOREIGN KEY (workout_exercise_id) REFERENCES workout_exercise(workout_exercise_id)
  );

  ${GOAL_TABLE_SQL}

  CREATE TABLE IF NOT EXISTS daily_log (
    daily_log_id  INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id       TEXT NOT NULL,
    date          DATE NOT NULL,
    activity_type TEXT NOT NULL CHECK (activity_type IN ('workout','rest')),
    notes         TEXT,
    FOREIGN KEY (user_id) REFERENCES users(user_id),
    UNIQUE (user_id, date)
  );

  CREATE TABLE IF NOT EXISTS streak (
    user_id            TEXT PRIMARY KEY,
    current_streak     INT DEFAULT 0 CHECK (current_streak >= 0),
    longest_streak     INT DEFAULT 0 CHECK (longest_streak >= 0),
    last_activity_date DATE,
    last_workout_date  DATE,
    FOREIGN KEY (user_id) REFERENCES users(user_id)
  );

  CREATE TABLE IF NOT EXISTS notification (
    notification_id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id         TEXT NOT NULL,
    type            TEXT NOT NULL CHECK (type IN ('GoalProgress','NewStreak','Milestone')),
    message         TEXT NOT NULL,
    timestamp       DATETIME DEFAULT CURRENT_TIMESTAMP,
    is_read         INTEGER DEFAULT 0,
    FOREIGN KEY (user_id) REFERENCES users(user_id)
  );

  CREATE TABLE IF NOT EXISTS milestone (
    milestone_id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id      TEXT NOT NULL,
    type         TEXT NOT NULL CHECK (type IN ('PersonalBest','LongestStreak','GoalAchieved')),
    exercise_id  INTEGER,
    value        REAL,
    date         DATE NOT NULL,
    FOREIGN KEY (user_id) REFERENCES users(user_id),
    FOREIGN KEY (exercise_id) REFERENCES exercise(exercise_id)
  );

  CREATE TABLE IF NOT EXISTS sync_queue (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    table_name  TEXT NOT NULL,
    record_id   TEXT NOT NULL,
    operation   TEXT NOT NULL CHECK (operation IN ('INSERT','UPDATE','DELETE')),
    timestamp   INTEGER NOT NULL,
    synced      INTEGER DEFAULT 0,
    retry_count INTEGER DEFAULT 0,
    last_error  TEXT,
    UNIQUE (table_name, record_id, operation)
  );

  CREATE TABLE IF NOT EXISTS schema_migrations (
    version    INTEGER PRIMARY KEY,
    name       TEXT NOT NULL,
    applied_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_workout_user_date ON workout(user_id, date);
  CREATE INDEX IF NOT EXISTS idx_workout_exercise_workout ON workout_exercise(workout_id);
  CREATE INDEX IF NOT EXISTS idx_workout_set_parent ON workout_set(workout_exercise_id);
  CREATE INDEX IF NOT EXISTS idx_goal_user ON goal(user_id, achieved);
  CREATE INDEX IF NOT EXISTS idx_sync_queue_pending ON sync_queue(synced, timestamp);
`;

/**
 * Create every table that does not exist yet. Existing tables keep their
 * shape; column and constraint changes are the job of runMigrations.
 */
export function createSchema(db: Database.Database): void {
  db.exec(SCHEMA_SQL);
}

export function columnNames(db: Database.Database, table: string): string[] {
  const rows = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
  return rows.map(row => row.name);
}

export function hasColumn(db: Database.Database, table: string, column: string): boolean {
  return columnNames(db, table).includes(column);
}

export function tableSql(db: Database.Database, table: string): string | undefined {
  const row = db
    .prepare("SELECT sql FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(table) as { sql: string } | undefined;
  return row?.sql;
}

export function indexExists(db: Database.Database, name: string): boolean {
  const row = db
    .prepare("SELECT 1 AS found FROM sqlite_master WHERE type = 'index' AND name = ?")
    .get(name) as { found: number } | undefined;
  return row !== undefined;
}
