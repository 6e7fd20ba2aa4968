// Table names as they appear in the local database and in sync queue entries
export const TABLES = {
  USERS: 'users',
  USER_METRICS: 'user_metrics',
  EXERCISE: 'exercise',
  WORKOUT: 'workout',
  WORKOUT_EXERCISE: 'workout_exercise',
  WORKOUT_SET: 'workout_set',
  GOAL: 'goal',
  DAILY_LOG: 'daily_log',
  STREAK: 'streak',
  NOTIFICATION: 'notification',
  MILESTONE: 'milestone',
  SYNC_QUEUE: 'sync_queue',
  SCHEMA_MIGRATIONS: 'schema_migrations',
} as const;

// File locations (relative to APP_DIR)
export const PATHS = {
  STATE_DIR: 'state',
  DB_FILE: 'fitledger.db',
} as const;

export const SYNC_CONFIG = {
  // Entries retried more often than this are left for manual attention
  MAX_RETRIES: 5,
  // Synced entries older than this are removed by cleanup
  SYNCED_RETENTION_MS: 7 * 24 * 60 * 60 * 1000,
  DRAIN_BATCH_SIZE: 100,
} as const;

export const STREAK_CONFIG = {
  // Consecutive-day counts that earn a LongestStreak milestone
  MILESTONE_DAYS: [7, 30],
} as const;

export const GOAL_CONFIG = {
  NEAR_COMPLETION_RATIO: 0.9,
  EXPIRING_WITHIN_DAYS: 3,
} as const;

// Server configuration defaults
export const SERVER_CONFIG = {
  FITNESS_API_PORT: 3004,
  FITNESS_API_HOST: '127.0.0.1',
  API_PREFIX: '/api/fitness',
  USER_HEADER: 'x-user-id',
} as const;
