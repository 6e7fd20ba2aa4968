export * from './auth.js';
export * from './config.js';
export * from './core.js';
export * from './errors.js';
export * from './logger.js';
export * from './outcome.js';
export * from './validation.js';
export * from './db/migrations.js';
export * from './db/schema.js';
export * from './db/seed.js';
export * from './db/store.js';
export * from './services/accounts.js';
export * from './services/goal-engine.js';
export * from './services/notifications.js';
export * from './services/streak-tracker.js';
export * from './services/workout-ledger.js';
export * from './sync/change-queue.js';
export * from './utils/dates.js';
