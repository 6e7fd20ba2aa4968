import { StaticAuthProvider, type AuthProvider } from './auth.js';
import { seedExercises } from './db/seed.js';
import { RecordStore, type StoreOptions } from './db/store.js';
import { moduleLogger } from './logger.js';
import { AccountService } from './services/accounts.js';
import { GoalEngine } from './services/goal-engine.js';
import { NotificationCenter } from './services/notifications.js';
import { StreakTracker } from './services/streak-tracker.js';
import { WorkoutLedger } from './services/workout-ledger.js';
import type { ChangeQueue } from './sync/change-queue.js';

const log = moduleLogger('core');

export interface FitnessCoreOptions extends StoreOptions {
  auth?: AuthProvider;
  /** Fill an empty exercise catalog from data/exercises.json. Defaults to true. */
  seed?: boolean;
}

export interface FitnessCore {
  store: RecordStore;
  changes: ChangeQueue;
  auth: AuthProvider;
  accounts: AccountService;
  workouts: WorkoutLedger;
  goals: GoalEngine;
  streaks: StreakTracker;
  notifications: NotificationCenter;
  close(): void;
}

/**
 * Open the store and wire every service to it. The caller owns the returned
 * core and closes it on shutdown.
 */
export function createFitnessCore(options: FitnessCoreOptions = {}): FitnessCore {
  const store = new RecordStore(options);
  const auth = options.auth ?? new StaticAuthProvider();

  if (options.seed ?? true) {
    seedExercises(store);
  }

  const { failed } = store.migrationReport;
  if (failed.length > 0) {
    log.warn({ failed }, 'Some migrations failed; continuing with the schema reached');
  }

  const goals = new GoalEngine(store, auth);
  const streaks = new StreakTracker(store, auth);

  return {
    store,
    changes: store.changes,
    auth,
    accounts: new AccountService(store),
    workouts: new WorkoutLedger(store, auth, goals, streaks),
    goals,
    streaks,
    notifications: new NotificationCenter(store, auth),
    close: () => store.close(),
  };
}
