import {
  GOAL_CONFIG,
  GoalState,
  TABLES,
  type Goal,
  type UserMetric,
  type Workout,
} from '@fitledger/shared';
import { resolveUserId, type AuthProvider } from '../auth.js';
import type { RecordStore } from '../db/store.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { moduleLogger } from '../logger.js';
import { goalAchieved, goalName } from '../messages.js';
import { failure, type Outcome, type SideEffectFailure } from '../outcome.js';
import { daysBetween, toDayKey, today } from '../utils/dates.js';
import {
  bodyWeightSchema,
  createGoalSchema,
  parseInput,
  updateGoalSchema,
  type CreateGoalInput,
  type UpdateGoalInput,
} from '../validation.js';

const log = moduleLogger('GoalEngine');

/**
 * Whether `progress` meets the goal's target. A missing or zero target counts
 * as met by any non-negative progress.
 */
export function isTargetReached(goal: Goal, progress: number): boolean {
  const target = goal.targetValue;
  if (target === undefined || target === 0) {
    return progress >= 0;
  }

  if (goal.kind !== 'WeightTarget') {
    return progress >= target;
  }

  const start = goal.startingValue ?? progress;
  if (target < start) return progress <= target;
  if (target > start) return progress >= target;
  return progress === target;
}

/**
 * Fraction of the way from start to target, clamped to [0, 1]. Weight goals
 * measure from their starting value, the other kinds from zero.
 */
export function completion(goal: Goal): number {
  const target = goal.targetValue;
  if (target === undefined || target === 0) {
    return 1;
  }

  let ratio: number;
  if (goal.kind === 'WeightTarget') {
    const start = goal.startingValue ?? goal.currentProgress;
    if (start === target) {
      ratio = goal.currentProgress === target ? 1 : 0;
    } else {
      ratio = (start - goal.currentProgress) / (start - target);
    }
  } else {
    ratio = goal.currentProgress / target;
  }

  return Math.min(1, Math.max(0, ratio));
}

interface Evaluation {
  goal: Goal | null;
  achieved: boolean;
  failures: SideEffectFailure[];
}

export interface MaintenanceReport {
  expired: number[];
  achieved: number[];
  updated: number[];
}

/**
 * Progress and lifecycle of goals. Active goals move to Achieved or Expired
 * and never leave either state.
 */
export class GoalEngine {
  constructor(
    private readonly store: RecordStore,
    private readonly auth: AuthProvider
  ) {}

  // -------------------------
  // Goal CRUD
  // -------------------------

  async createGoal(input: CreateGoalInput): Promise<Outcome<Goal>> {
    const parsed = parseInput(createGoalSchema, input);
    const userId = resolveUserId(this.auth, parsed.userId);
    const startDate = toDayKey(parsed.startDate ?? new Date());
    const endDate = toDayKey(parsed.endDate);

    if (endDate < startDate) {
      throw new ValidationError(`endDate ${endDate} is before startDate ${startDate}`);
    }

    let exerciseId: number | undefined;
    let startingValue: number | undefined;

    if (parsed.kind === 'ExerciseTarget') {
      if (!this.store.getExercise(parsed.exerciseId)) {
        throw new ValidationError(`Unknown exercise ${parsed.exerciseId}`);
      }
      exerciseId = parsed.exerciseId;
    } else if (parsed.kind === 'WeightTarget') {
      startingValue = parsed.startingValue ?? this.store.latestBodyWeight(userId)?.weightKg;
      if (startingValue === undefined) {
        throw new ValidationError('WeightTarget goals need a startingValue or a logged body weight');
      }
    }

    return this.store.exclusive(() => {
      const draft = this.store.transaction(() =>
        this.store.insertGoal({
          userId,
          kind: parsed.kind,
          exerciseId,
          targetValue: parsed.targetValue,
          startDate,
          endDate,
          startingValue,
        })
      );

      const failures: SideEffectFailure[] = [];
      this.enqueue(TABLES.GOAL, draft.id, 'INSERT', failures);

      const evaluation = this.evaluate(draft.id, this.measureProgress(draft));
      failures.push(...evaluation.failures);

      log.info({ goalId: draft.id, kind: draft.kind, userId }, 'Goal created');
      return { value: evaluation.goal ?? draft, failures };
    });
  }

  /**
   * Change the target or end date of an Active goal, then re-evaluate it.
   */
  async updateGoal(goalId: number, input: UpdateGoalInput): Promise<Outcome<Goal>> {
    const parsed = parseInput(updateGoalSchema, input);

    return this.store.exclusive(() => {
      const current = this.store.getGoal(goalId);
      if (!current) {
        throw new NotFoundError('Goal', goalId);
      }
      if (current.state !== GoalState.Active) {
        throw new ValidationError(`Goal ${goalId} is no longer active`);
      }

      const endDate = parsed.endDate === undefined ? undefined : toDayKey(parsed.endDate);
      if (endDate !== undefined && endDate < current.startDate) {
        throw new ValidationError(`endDate ${endDate} is before startDate ${current.startDate}`);
      }

      const updated = this.store.transaction(() =>
        this.store.updateGoalTerms(goalId, { targetValue: parsed.targetValue, endDate })
      );

      const failures: SideEffectFailure[] = [];
      this.enqueue(TABLES.GOAL, goalId, 'UPDATE', failures);

      const goal = updated ?? current;
      const evaluation = this.evaluate(goalId, this.measureProgress(goal));
      failures.push(...evaluation.failures);

      return { value: evaluation.goal ?? goal, failures };
    });
  }

  async deleteGoal(goalId: number): Promise<Outcome<boolean>> {
    return this.store.exclusive(() => {
      const deleted = this.store.transaction(() => this.store.deleteGoal(goalId));

      const failures: SideEffectFailure[] = [];
      if (deleted) {
        this.enqueue(TABLES.GOAL, goalId, 'DELETE', failures);
      }
      return { value: deleted, failures };
    });
  }

  getGoal(goalId: number): Goal | null {
    return this.store.getGoal(goalId);
  }

  listGoals(userId?: string, state?: GoalState): Goal[] {
    return this.store.listGoals(resolveUserId(this.auth, userId), state);
  }

  nearCompletionGoals(userId?: string): Goal[] {
    return this.listGoals(userId, GoalState.Active).filter(
      goal => completion(goal) >= GOAL_CONFIG.NEAR_COMPLETION_RATIO
    );
  }

  expiringGoals(withinDays: number = GOAL_CONFIG.EXPIRING_WITHIN_DAYS, userId?: string): Goal[] {
    const now = today();
    return this.listGoals(userId, GoalState.Active).filter(goal => {
      const left = daysBetween(now, goal.endDate);
      return left >= 0 && left <= withinDays;
    });
  }

  // -------------------------
  // Body weight
  // -------------------------

  /**
   * Record a body-weight measurement and re-evaluate Active weight goals.
   */
  async logBodyWeight(
    weightKg: number,
    measuredAt?: Date | string,
    userId?: string
  ): Promise<Outcome<UserMetric>> {
    const parsed = parseInput(bodyWeightSchema, { weightKg, measuredAt });
    const user = resolveUserId(this.auth, userId);
    const timestamp = new Date(parsed.measuredAt ?? new Date()).toISOString();

    return this.store.exclusive(() => {
      const metric = this.store.transaction(() => this.store.insertBodyWeight(user, parsed.weightKg, timestamp));

      const failures: SideEffectFailure[] = [];
      this.enqueue(TABLES.USER_METRICS, metric.id, 'INSERT', failures);

      for (const goal of this.activeGoals(user, 'WeightTarget')) {
        failures.push(...this.evaluate(goal.id, this.measureProgress(goal)).failures);
      }

      return { value: metric, failures };
    });
  }

  bodyWeightHistory(userId?: string): UserMetric[] {
    return this.store.listBodyWeights(resolveUserId(this.auth, userId));
  }

  // -------------------------
  // Hooks
  // -------------------------

  /**
   * Re-count workouts for every Active frequency goal of the workout's owner.
   * Resolves to the goals this call achieved.
   */
  async onWorkoutSaved(workout: Workout): Promise<Outcome<Goal[]>> {
    return this.refreshFrequencyGoals(workout.userId);
  }

  async onWorkoutDeleted(workout: Workout): Promise<Outcome<Goal[]>> {
    return this.refreshFrequencyGoals(workout.userId);
  }

  async onPersonalBest(exerciseId: number, newMaxWeight: number, userId?: string): Promise<Outcome<Goal[]>> {
    const user = resolveUserId(this.auth, userId);

    return this.store.exclusive(() =>
      this.evaluateAll(
        this.activeGoals(user, 'ExerciseTarget').filter(goal => goal.exerciseId === exerciseId),
        () => newMaxWeight
      )
    );
  }

  /**
   * Expire Active goals past their end date, then refresh the progress of the
   * rest from their sources.
   */
  async performDailyMaintenance(userId?: string): Promise<Outcome<MaintenanceReport>> {
    const user = resolveUserId(this.auth, userId);
    const now = today();

    return this.store.exclusive(() => {
      const report: MaintenanceReport = { expired: [], achieved: [], updated: [] };
      const failures: SideEffectFailure[] = [];

      for (const goal of this.store.listGoals(user, GoalState.Active)) {
        try {
          if (now > goal.endDate) {
            if (this.expire(goal.id)) {
              report.expired.push(goal.id);
              this.enqueue(TABLES.GOAL, goal.id, 'UPDATE', failures);
            }
            continue;
          }

          const evaluation = this.evaluate(goal.id, this.measureProgress(goal));
          failures.push(...evaluation.failures);
          if (evaluation.achieved) {
            report.achieved.push(goal.id);
          } else if (evaluation.goal && evaluation.goal.currentProgress !== goal.currentProgress) {
            report.updated.push(goal.id);
          }
        } catch (error) {
          log.error({ err: error, goalId: goal.id }, 'Goal maintenance failed');
          failures.push(failure('goals', error));
        }
      }

      log.info({ userId: user, ...report }, 'Daily goal maintenance finished');
      return { value: report, failures };
    });
  }

  // -------------------------
  // Evaluation
  // -------------------------

  private async refreshFrequencyGoals(userId: string): Promise<Outcome<Goal[]>> {
    return this.store.exclusive(() =>
      this.evaluateAll(this.activeGoals(userId, 'WorkoutFrequency'), goal => this.measureProgress(goal))
    );
  }

  private activeGoals(userId: string, kind: Goal['kind']): Goal[] {
    return this.store.listGoals(userId, GoalState.Active).filter(goal => goal.kind === kind);
  }

  private evaluateAll(goals: Goal[], progressOf: (goal: Goal) => number | null): Outcome<Goal[]> {
    const achieved: Goal[] = [];
    const failures: SideEffectFailure[] = [];

    for (const goal of goals) {
      try {
        const evaluation = this.evaluate(goal.id, progressOf(goal));
        failures.push(...evaluation.failures);
        if (evaluation.achieved && evaluation.goal) {
          achieved.push(evaluation.goal);
        }
      } catch (error) {
        log.error({ err: error, goalId: goal.id }, 'Goal evaluation failed');
        failures.push(failure('goals', error));
      }
    }

    return { value: achieved, failures };
  }

  private measureProgress(goal: Goal): number | null {
    switch (goal.kind) {
      case 'ExerciseTarget':
        return goal.exerciseId === undefined
          ? null
          : (this.store.maxWeightForExercise(goal.userId, goal.exerciseId) ?? 0);
      case 'WorkoutFrequency':
        return this.store.countWorkoutsInRange(goal.userId, goal.startDate, goal.endDate);
      case 'WeightTarget':
        return this.store.latestBodyWeight(goal.userId)?.weightKg ?? goal.startingValue ?? null;
    }
  }

  /**
   * Persist new progress and achieve the goal when its target is met. The
   * stored state is re-read inside the transaction; anything but Active is
   * left untouched.
   */
  private evaluate(goalId: number, progress: number | null): Evaluation {
    if (progress === null) {
      return { goal: this.store.getGoal(goalId), achieved: false, failures: [] };
    }

    const day = today();
    const result = this.store.transaction(() => {
      const current = this.store.getGoal(goalId);
      if (!current || current.state !== GoalState.Active) {
        return { goal: current, achieved: false, changed: false, milestoneId: null };
      }

      const changed = current.currentProgress !== progress;
      if (changed) {
        this.store.updateGoalProgress(goalId, progress);
      }

      const goal: Goal = { ...current, currentProgress: progress };
      if (!isTargetReached(goal, progress)) {
        return { goal, achieved: false, changed, milestoneId: null };
      }

      this.store.setGoalState(goalId, GoalState.Achieved, day);
      const milestone = this.store.insertMilestone({
        userId: goal.userId,
        kind: 'GoalAchieved',
        exerciseId: goal.exerciseId,
        value: goal.targetValue,
        date: day,
      });
      this.store.insertNotification(goal.userId, 'GoalProgress', goalAchieved(this.nameOf(goal)));

      return {
        goal: { ...goal, state: GoalState.Achieved, achievedDate: day },
        achieved: true,
        changed: true,
        milestoneId: milestone.id,
      };
    });

    const failures: SideEffectFailure[] = [];
    if (result.changed) {
      this.enqueue(TABLES.GOAL, goalId, 'UPDATE', failures);
    }
    if (result.milestoneId !== null) {
      this.enqueue(TABLES.MILESTONE, result.milestoneId, 'INSERT', failures);
      log.info({ goalId, userId: result.goal?.userId }, 'Goal achieved');
    }

    return { goal: result.goal, achieved: result.achieved, failures };
  }

  private expire(goalId: number): boolean {
    return this.store.transaction(() => {
      const current = this.store.getGoal(goalId);
      if (!current || current.state !== GoalState.Active) {
        return false;
      }
      return this.store.setGoalState(goalId, GoalState.Expired);
    });
  }

  private nameOf(goal: Goal): string {
    const exercise = goal.exerciseId === undefined ? null : this.store.getExercise(goal.exerciseId);
    return goalName(goal, exercise?.name);
  }

  private enqueue(
    table: string,
    recordId: number,
    operation: 'INSERT' | 'UPDATE' | 'DELETE',
    failures: SideEffectFailure[]
  ): void {
    const result = this.store.markForSync(table, recordId, operation);
    if (!result.ok) {
      log.warn({ table, recordId, error: result.error }, 'Goal change not queued for sync');
      failures.push(failure('changeQueue', result.error));
    }
  }
}
