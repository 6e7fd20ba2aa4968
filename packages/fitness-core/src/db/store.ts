import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import {
  GoalState,
  TABLES,
  type ActivityKind,
  type DailyLog,
  type DayKey,
  type Exercise,
  type Goal,
  type GoalKind,
  type Milestone,
  type MilestoneKind,
  type Notification,
  type NotificationKind,
  type PersonalBest,
  type ProgressPoint,
  type Streak,
  type SyncOperation,
  type User,
  type UserMetric,
  type Workout,
  type WorkoutDetail,
  type WorkoutSet,
} from '@fitledger/shared';
import { getDatabasePath } from '../config.js';
import { FitnessError, TransactionFailure } from '../errors.js';
import { moduleLogger } from '../logger.js';
import { ChangeQueue, type EnqueueResult } from '../sync/change-queue.js';
import { WriteLock } from './lock.js';
import { MIGRATIONS, runMigrations, type Migration, type MigrationReport } from './migrations.js';
import {
  toDailyLog,
  toExercise,
  toGoal,
  toMilestone,
  toNotification,
  toStreak,
  toUser,
  toUserMetric,
  toWorkout,
  toWorkoutSet,
  type DailyLogRow,
  type ExerciseRow,
  type GoalRow,
  type MilestoneRow,
  type NotificationRow,
  type StreakRow,
  type UserMetricRow,
  type UserRow,
  type WorkoutRow,
  type WorkoutSetRow,
} from './rows.js';
import { createSchema } from './schema.js';

const log = moduleLogger('RecordStore');

export interface StoreOptions {
  /** File path or ':memory:'. Defaults to the configured database path. */
  path?: string;
  /** Already-open handle, used instead of `path`. */
  database?: Database.Database;
  migrations?: Migration[];
}

export interface NewUser {
  id: string;
  firstName: string;
  lastName: string;
  heightCm?: number;
  registrationDate?: string;
  lastLogin?: string;
}

export interface NewWorkout {
  id?: number;
  userId: string;
  date: DayKey;
  durationMinutes?: number;
  notes?: string;
}

export interface NewWorkoutSet {
  setNumber: number;
  reps?: number;
  weight?: number;
}

export interface NewGoal {
  id?: number;
  userId: string;
  kind: GoalKind;
  exerciseId?: number;
  targetValue?: number;
  startDate: DayKey;
  endDate: DayKey;
  state?: GoalState;
  currentProgress?: number;
  startingValue?: number;
  achievedDate?: DayKey;
}

export type NewMilestone = Omit<Milestone, 'id'>;

/**
 * Owner of the single database handle. Methods are row-level and synchronous;
 * composite operations wrap them in `transaction` and serialize through
 * `exclusive`.
 *
 * Standalone writes to user-owned tables add a sync queue entry. Inside a
 * transaction they don't: the operation that owns the transaction enqueues
 * after commit so a rolled-back write never reaches the queue.
 */
export class RecordStore {
  readonly db: Database.Database;
  readonly changes: ChangeQueue;
  readonly migrationReport: MigrationReport;
  private readonly lock = new WriteLock();

  constructor(options: StoreOptions = {}) {
    this.db = options.database ?? RecordStore.open(options.path ?? getDatabasePath());
    this.db.pragma('foreign_keys = ON');

    createSchema(this.db);
    this.migrationReport = runMigrations(this.db, options.migrations ?? MIGRATIONS);
    this.changes = new ChangeQueue(this.db);
  }

  private static open(dbPath: string): Database.Database {
    if (dbPath === ':memory:') {
      return new Database(dbPath);
    }

    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    log.info({ dbPath }, 'Database opened');
    return db;
  }

  // -------------------------
  // Transactions & sync
  // -------------------------

  /**
   * Run `fn` atomically. Engine errors roll back and surface as
   * TransactionFailure; domain errors are rethrown unchanged. A call made
   * inside another transaction joins it.
   */
  transaction<T>(fn: () => T): T {
    if (this.db.inTransaction) {
      return fn();
    }

    try {
      return this.db.transaction(fn)();
    } catch (error) {
      if (error instanceof FitnessError) {
        throw error;
      }
      throw new TransactionFailure(error);
    }
  }

  /**
   * Queue `task` behind every composite write already in flight.
   */
  exclusive<T>(task: () => T | Promise<T>): Promise<T> {
    return this.lock.run(task);
  }

  markForSync(tableName: string, recordId: string | number, operation: SyncOperation): EnqueueResult {
    return this.changes.enqueue(tableName, recordId, operation);
  }

  private track(tableName: string, recordId: string | number, operation: SyncOperation): void {
    if (!this.db.inTransaction) {
      this.markForSync(tableName, recordId, operation);
    }
  }

  close(): void {
    this.db.close();
  }

  // -------------------------
  // Users
  // -------------------------

  saveUser(user: NewUser): User {
    const row = this.db
      .prepare(
        `INSERT INTO users (user_id, first_name, last_name, height_cm, registration_date, last_login)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT (user_id) DO UPDATE SET
           first_name = excluded.first_name,
           last_name = excluded.last_name,
           height_cm = excluded.height_cm,
           last_login = excluded.last_login
         RETURNING *`
      )
      .get(
        user.id,
        user.firstName,
        user.lastName,
        user.heightCm ?? null,
        user.registrationDate ?? new Date().toISOString(),
        user.lastLogin ?? null
      ) as UserRow;

    this.track(TABLES.USERS, user.id, 'INSERT');
    return toUser(row);
  }

  getUser(userId: string): User | null {
    const row = this.db.prepare('SELECT * FROM users WHERE user_id = ?').get(userId) as UserRow | undefined;
    return row ? toUser(row) : null;
  }

  touchLastLogin(userId: string, at: string = new Date().toISOString()): boolean {
    const result = this.db.prepare('UPDATE users SET last_login = ? WHERE user_id = ?').run(at, userId);
    if (result.changes > 0) {
      this.track(TABLES.USERS, userId, 'UPDATE');
    }
    return result.changes > 0;
  }

  // -------------------------
  // Body metrics
  // -------------------------

  insertBodyWeight(userId: string, weightKg: number, measuredAt: string): UserMetric {
    const row = this.db
      .prepare('INSERT INTO user_metrics (user_id, weight_kg, measured_at) VALUES (?, ?, ?) RETURNING *')
      .get(userId, weightKg, measuredAt) as UserMetricRow;

    this.track(TABLES.USER_METRICS, row.metric_id, 'INSERT');
    return toUserMetric(row);
  }

  latestBodyWeight(userId: string): UserMetric | null {
    const row = this.db
      .prepare(
        'SELECT * FROM user_metrics WHERE user_id = ? ORDER BY measured_at DESC, metric_id DESC LIMIT 1'
      )
      .get(userId) as UserMetricRow | undefined;
    return row ? toUserMetric(row) : null;
  }

  listBodyWeights(userId: string): UserMetric[] {
    const rows = this.db
      .prepare('SELECT * FROM user_metrics WHERE user_id = ? ORDER BY measured_at ASC, metric_id ASC')
      .all(userId) as UserMetricRow[];
    return rows.map(toUserMetric);
  }

  // -------------------------
  // Exercises (reference data, never queued for sync)
  // -------------------------

  countExercises(): number {
    const { count } = this.db.prepare('SELECT COUNT(*) AS count FROM exercise').get() as { count: number };
    return count;
  }

  insertExercise(exercise: Omit<Exercise, 'id'>): Exercise {
    const row = this.db
      .prepare('INSERT INTO exercise (name, muscle_group, description) VALUES (?, ?, ?) RETURNING *')
      .get(exercise.name, exercise.muscleGroup, exercise.description ?? null) as ExerciseRow;
    return toExercise(row);
  }

  getExercise(exerciseId: number): Exercise | null {
    const row = this.db
      .prepare('SELECT * FROM exercise WHERE exercise_id = ?')
      .get(exerciseId) as ExerciseRow | undefined;
    return row ? toExercise(row) : null;
  }

  listExercises(muscleGroup?: string): Exercise[] {
    const rows = muscleGroup
      ? (this.db
          .prepare('SELECT * FROM exercise WHERE muscle_group = ? ORDER BY name ASC')
          .all(muscleGroup) as ExerciseRow[])
      : (this.db.prepare('SELECT * FROM exercise ORDER BY name ASC').all() as ExerciseRow[]);
    return rows.map(toExercise);
  }

  listMuscleGroups(): string[] {
    const rows = this.db
      .prepare('SELECT DISTINCT muscle_group FROM exercise WHERE muscle_group IS NOT NULL ORDER BY muscle_group ASC')
      .all() as Array<{ muscle_group: string }>;
    return rows.map(row => row.muscle_group);
  }

  // -------------------------
  // Workouts
  // -------------------------

  insertWorkout(workout: NewWorkout): Workout {
    const row = this.db
      .prepare(
        `INSERT INTO workout (workout_id, user_id, date, duration, notes)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT (workout_id) DO UPDATE SET
           user_id = excluded.user_id,
           date = excluded.date,
           duration = excluded.duration,
           notes = excluded.notes
         RETURNING *`
      )
      .get(
        workout.id ?? null,
        workout.userId,
        workout.date,
        workout.durationMinutes ?? null,
        workout.notes ?? null
      ) as WorkoutRow;

    this.track(TABLES.WORKOUT, row.workout_id, 'INSERT');
    return toWorkout(row);
  }

  insertWorkoutExercise(workoutId: number, exerciseId: number): number {
    const result = this.db
      .prepare('INSERT INTO workout_exercise (workout_id, exercise_id) VALUES (?, ?)')
      .run(workoutId, exerciseId);
    return Number(result.lastInsertRowid);
  }

  insertWorkoutSet(workoutExerciseId: number, set: NewWorkoutSet): number {
    const result = this.db
      .prepare('INSERT INTO workout_set (workout_exercise_id, set_number, reps, weight) VALUES (?, ?, ?, ?)')
      .run(workoutExerciseId, set.setNumber, set.reps ?? null, set.weight ?? null);
    return Number(result.lastInsertRowid);
  }

  getWorkout(workoutId: number): Workout | null {
    const row = this.db
      .prepare('SELECT * FROM workout WHERE workout_id = ?')
      .get(workoutId) as WorkoutRow | undefined;
    return row ? toWorkout(row) : null;
  }

  getWorkoutDetail(workoutId: number): WorkoutDetail | null {
    const workout = this.getWorkout(workoutId);
    if (!workout) return null;

    const exerciseRows = this.db
      .prepare(
        `SELECT we.workout_exercise_id, e.*
         FROM workout_exercise we
         JOIN exercise e ON we.exercise_id = e.exercise_id
         WHERE we.workout_id = ?
         ORDER BY we.workout_exercise_id ASC`
      )
      .all(workoutId) as Array<ExerciseRow & { workout_exercise_id: number }>;

    const setsFor = this.db.prepare(
      'SELECT * FROM workout_set WHERE workout_exercise_id = ? ORDER BY set_number ASC'
    );

    return {
      ...workout,
      exercises: exerciseRows.map(row => ({
        workoutExerciseId: row.workout_exercise_id,
        exercise: toExercise(row),
        sets: (setsFor.all(row.workout_exercise_id) as WorkoutSetRow[]).map(toWorkoutSet),
      })),
    };
  }

  listWorkouts(userId: string, range?: { start: DayKey; end: DayKey }): Workout[] {
    const rows = range
      ? (this.db
          .prepare(
            'SELECT * FROM workout WHERE user_id = ? AND date BETWEEN ? AND ? ORDER BY date DESC, workout_id DESC'
          )
          .all(userId, range.start, range.end) as WorkoutRow[])
      : (this.db
          .prepare('SELECT * FROM workout WHERE user_id = ? ORDER BY date DESC, workout_id DESC')
          .all(userId) as WorkoutRow[]);
    return rows.map(toWorkout);
  }

  updateWorkout(
    workoutId: number,
    changes: { durationMinutes?: number | null; notes?: string | null }
  ): Workout | null {
    const current = this.getWorkout(workoutId);
    if (!current) return null;

    const duration = changes.durationMinutes !== undefined ? changes.durationMinutes : current.durationMinutes;
    const notes = changes.notes !== undefined ? changes.notes : current.notes;

    const row = this.db
      .prepare('UPDATE workout SET duration = ?, notes = ? WHERE workout_id = ? RETURNING *')
      .get(duration ?? null, notes ?? null, workoutId) as WorkoutRow;

    this.track(TABLES.WORKOUT, workoutId, 'UPDATE');
    return toWorkout(row);
  }

  /**
   * Delete a workout with its exercises and sets, children first.
   */
  deleteWorkoutTree(workoutId: number): boolean {
    return this.transaction(() => {
      const children = this.db
        .prepare('SELECT workout_exercise_id FROM workout_exercise WHERE workout_id = ?')
        .all(workoutId) as Array<{ workout_exercise_id: number }>;

      const deleteSets = this.db.prepare('DELETE FROM workout_set WHERE workout_exercise_id = ?');
      for (const child of children) {
        deleteSets.run(child.workout_exercise_id);
      }

      this.db.prepare('DELETE FROM workout_exercise WHERE workout_id = ?').run(workoutId);
      const result = this.db.prepare('DELETE FROM workout WHERE workout_id = ?').run(workoutId);
      return result.changes > 0;
    });
  }

  countWorkoutsInRange(userId: string, start: DayKey, end: DayKey): number {
    const { count } = this.db
      .prepare('SELECT COUNT(*) AS count FROM workout WHERE user_id = ? AND date BETWEEN ? AND ?')
      .get(userId, start, end) as { count: number };
    return count;
  }

  workoutDates(userId: string, start: DayKey, end: DayKey): DayKey[] {
    const rows = this.db
      .prepare('SELECT DISTINCT date FROM workout WHERE user_id = ? AND date BETWEEN ? AND ? ORDER BY date ASC')
      .all(userId, start, end) as Array<{ date: string }>;
    return rows.map(row => row.date);
  }

  /**
   * Heaviest recorded set for (user, exercise), optionally ignoring one workout.
   * Null when nothing weighted has been logged.
   */
  maxWeightForExercise(userId: string, exerciseId: number, excludeWorkoutId?: number): number | null {
    const { max_weight } = this.db
      .prepare(
        `SELECT MAX(ws.weight) AS max_weight
         FROM workout_set ws
         JOIN workout_exercise we ON ws.workout_exercise_id = we.workout_exercise_id
         JOIN workout w ON we.workout_id = w.workout_id
         WHERE we.exercise_id = ? AND w.user_id = ? AND w.workout_id != ? AND ws.weight IS NOT NULL`
      )
      .get(exerciseId, userId, excludeWorkoutId ?? -1) as { max_weight: number | null };
    return max_weight;
  }

  personalBests(userId: string): PersonalBest[] {
    const rows = this.db
      .prepare(
        `SELECT we.exercise_id AS exerciseId, MAX(ws.weight) AS weight
         FROM workout_set ws
         JOIN workout_exercise we ON ws.workout_exercise_id = we.workout_exercise_id
         JOIN workout w ON we.workout_id = w.workout_id
         WHERE w.user_id = ? AND ws.weight > 0
         GROUP BY we.exercise_id
         ORDER BY we.exercise_id ASC`
      )
      .all(userId) as PersonalBest[];
    return rows;
  }

  exerciseProgress(userId: string, exerciseId: number): ProgressPoint[] {
    const rows = this.db
      .prepare(
        `SELECT w.date AS date, MAX(ws.weight) AS weight
         FROM workout_set ws
         JOIN workout_exercise we ON ws.workout_exercise_id = we.workout_exercise_id
         JOIN workout w ON we.workout_id = w.workout_id
         WHERE we.exercise_id = ? AND w.user_id = ? AND ws.weight IS NOT NULL
         GROUP BY w.date
         ORDER BY w.date ASC`
      )
      .all(exerciseId, userId) as ProgressPoint[];
    return rows;
  }

  // -------------------------
  // Goals
  // -------------------------

  insertGoal(goal: NewGoal): Goal {
    const row = this.db
      .prepare(
        `INSERT INTO goal (goal_id, user_id, type, exercise_id, target_value, start_date, end_date,
                           achieved, current_progress, starting_weight, achieved_date)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (goal_id) DO UPDATE SET
           type = excluded.type,
           exercise_id = excluded.exercise_id,
           target_value = excluded.target_value,
           start_date = excluded.start_date,
           end_date = excluded.end_date,
           achieved = excluded.achieved,
           current_progress = excluded.current_progress,
           starting_weight = excluded.starting_weight,
           achieved_date = excluded.achieved_date
         RETURNING *`
      )
      .get(
        goal.id ?? null,
        goal.userId,
        goal.kind,
        goal.exerciseId ?? null,
        goal.targetValue ?? null,
        goal.startDate,
        goal.endDate,
        goal.state ?? GoalState.Active,
        goal.currentProgress ?? 0,
        goal.startingValue ?? null,
        goal.achievedDate ?? null
      ) as GoalRow;

    this.track(TABLES.GOAL, row.goal_id, 'INSERT');
    return toGoal(row);
  }

  getGoal(goalId: number): Goal | null {
    const row = this.db.prepare('SELECT * FROM goal WHERE goal_id = ?').get(goalId) as GoalRow | undefined;
    return row ? toGoal(row) : null;
  }

  listGoals(userId: string, state?: GoalState): Goal[] {
    const rows =
      state === undefined
        ? (this.db
            .prepare('SELECT * FROM goal WHERE user_id = ? ORDER BY end_date ASC, goal_id ASC')
            .all(userId) as GoalRow[])
        : (this.db
            .prepare('SELECT * FROM goal WHERE user_id = ? AND achieved = ? ORDER BY end_date ASC, goal_id ASC')
            .all(userId, state) as GoalRow[]);
    return rows.map(toGoal);
  }

  updateGoalProgress(goalId: number, progress: number): boolean {
    const result = this.db.prepare('UPDATE goal SET current_progress = ? WHERE goal_id = ?').run(progress, goalId);
    if (result.changes > 0) {
      this.track(TABLES.GOAL, goalId, 'UPDATE');
    }
    return result.changes > 0;
  }

  updateGoalTerms(goalId: number, terms: { targetValue?: number; endDate?: DayKey }): Goal | null {
    const current = this.getGoal(goalId);
    if (!current) return null;

    const row = this.db
      .prepare('UPDATE goal SET target_value = ?, end_date = ? WHERE goal_id = ? RETURNING *')
      .get(terms.targetValue ?? current.targetValue ?? null, terms.endDate ?? current.endDate, goalId) as GoalRow;

    this.track(TABLES.GOAL, goalId, 'UPDATE');
    return toGoal(row);
  }

  setGoalState(goalId: number, state: GoalState, achievedDate?: DayKey): boolean {
    const result = this.db
      .prepare('UPDATE goal SET achieved = ?, achieved_date = ? WHERE goal_id = ?')
      .run(state, achievedDate ?? null, goalId);
    if (result.changes > 0) {
      this.track(TABLES.GOAL, goalId, 'UPDATE');
    }
    return result.changes > 0;
  }

  deleteGoal(goalId: number): boolean {
    const result = this.db.prepare('DELETE FROM goal WHERE goal_id = ?').run(goalId);
    if (result.changes > 0) {
      this.track(TABLES.GOAL, goalId, 'DELETE');
    }
    return result.changes > 0;
  }

  // -------------------------
  // Daily logs & streaks
  // -------------------------

  getDailyLog(userId: string, date: DayKey): DailyLog | null {
    const row = this.db
      .prepare('SELECT * FROM daily_log WHERE user_id = ? AND date = ?')
      .get(userId, date) as DailyLogRow | undefined;
    return row ? toDailyLog(row) : null;
  }

  insertDailyLog(userId: string, date: DayKey, activity: ActivityKind, notes?: string): DailyLog {
    const row = this.db
      .prepare('INSERT INTO daily_log (user_id, date, activity_type, notes) VALUES (?, ?, ?, ?) RETURNING *')
      .get(userId, date, activity, notes ?? null) as DailyLogRow;

    this.track(TABLES.DAILY_LOG, row.daily_log_id, 'INSERT');
    return toDailyLog(row);
  }

  setDailyLogActivity(dailyLogId: number, activity: ActivityKind): boolean {
    const result = this.db
      .prepare('UPDATE daily_log SET activity_type = ? WHERE daily_log_id = ?')
      .run(activity, dailyLogId);
    if (result.changes > 0) {
      this.track(TABLES.DAILY_LOG, dailyLogId, 'UPDATE');
    }
    return result.changes > 0;
  }

  listDailyLogs(userId: string, start: DayKey, end: DayKey): DailyLog[] {
    const rows = this.db
      .prepare('SELECT * FROM daily_log WHERE user_id = ? AND date BETWEEN ? AND ? ORDER BY date DESC')
      .all(userId, start, end) as DailyLogRow[];
    return rows.map(toDailyLog);
  }

  // Logged days on or before `day`, newest first
  loggedDaysUntil(userId: string, day: DayKey): DayKey[] {
    const rows = this.db
      .prepare('SELECT date FROM daily_log WHERE user_id = ? AND date <= ? ORDER BY date DESC')
      .all(userId, day) as Array<{ date: string }>;
    return rows.map(row => row.date);
  }

  getStreak(userId: string): Streak | null {
    const row = this.db.prepare('SELECT * FROM streak WHERE user_id = ?').get(userId) as StreakRow | undefined;
    return row ? toStreak(row) : null;
  }

  saveStreak(streak: Streak): Streak {
    const row = this.db
      .prepare(
        `INSERT INTO streak (user_id, current_streak, longest_streak, last_activity_date, last_workout_date)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT (user_id) DO UPDATE SET
           current_streak = excluded.current_streak,
           longest_streak = excluded.longest_streak,
           last_activity_date = excluded.last_activity_date,
           last_workout_date = excluded.last_workout_date
         RETURNING *`
      )
      .get(
        streak.userId,
        streak.currentStreak,
        streak.longestStreak,
        streak.lastActivityDate ?? null,
        streak.lastWorkoutDate ?? null
      ) as StreakRow;

    this.track(TABLES.STREAK, streak.userId, 'UPDATE');
    return toStreak(row);
  }

  // -------------------------
  // Milestones & notifications
  // -------------------------

  insertMilestone(milestone: NewMilestone): Milestone {
    const row = this.db
      .prepare('INSERT INTO milestone (user_id, type, exercise_id, value, date) VALUES (?, ?, ?, ?, ?) RETURNING *')
      .get(
        milestone.userId,
        milestone.kind,
        milestone.exerciseId ?? null,
        milestone.value ?? null,
        milestone.date
      ) as MilestoneRow;

    this.track(TABLES.MILESTONE, row.milestone_id, 'INSERT');
    return toMilestone(row);
  }

  listMilestones(userId: string, kind?: MilestoneKind): Milestone[] {
    const rows = kind
      ? (this.db
          .prepare('SELECT * FROM milestone WHERE user_id = ? AND type = ? ORDER BY date DESC, milestone_id DESC')
          .all(userId, kind) as MilestoneRow[])
      : (this.db
          .prepare('SELECT * FROM milestone WHERE user_id = ? ORDER BY date DESC, milestone_id DESC')
          .all(userId) as MilestoneRow[]);
    return rows.map(toMilestone);
  }

  insertNotification(userId: string, kind: NotificationKind, message: string): Notification {
    const row = this.db
      .prepare(
        'INSERT INTO notification (user_id, type, message, timestamp, is_read) VALUES (?, ?, ?, ?, 0) RETURNING *'
      )
      .get(userId, kind, message, new Date().toISOString()) as NotificationRow;
    return toNotification(row);
  }

  listNotifications(userId: string, unreadOnly = false): Notification[] {
    const sql = unreadOnly
      ? 'SELECT * FROM notification WHERE user_id = ? AND is_read = 0 ORDER BY timestamp DESC, notification_id DESC'
      : 'SELECT * FROM notification WHERE user_id = ? ORDER BY timestamp DESC, notification_id DESC';
    const rows = this.db.prepare(sql).all(userId) as NotificationRow[];
    return rows.map(toNotification);
  }

  markNotificationRead(notificationId: number): boolean {
    const result = this.db
      .prepare('UPDATE notification SET is_read = 1 WHERE notification_id = ?')
      .run(notificationId);
    return result.changes > 0;
  }

  markAllNotificationsRead(userId: string): number {
    const result = this.db
      .prepare('UPDATE notification SET is_read = 1 WHERE user_id = ? AND is_read = 0')
      .run(userId);
    return result.changes;
  }

  countUnreadNotifications(userId: string): number {
    const { count } = this.db
      .prepare('SELECT COUNT(*) AS count FROM notification WHERE user_id = ? AND is_read = 0')
      .get(userId) as { count: number };
    return count;
  }
}
