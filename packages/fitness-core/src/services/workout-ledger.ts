import {
  TABLES,
  type Goal,
  type Milestone,
  type PersonalBest,
  type ProgressPoint,
  type Streak,
  type Workout,
  type WorkoutDetail,
} from '@fitledger/shared';
import { resolveUserId, type AuthProvider } from '../auth.js';
import { WriteLock } from '../db/lock.js';
import type { RecordStore } from '../db/store.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { moduleLogger } from '../logger.js';
import { personalBest } from '../messages.js';
import { failure, type Outcome, type SideEffectFailure } from '../outcome.js';
import { toDayKey, today } from '../utils/dates.js';
import {
  parseInput,
  saveWorkoutSchema,
  updateWorkoutSchema,
  type SaveWorkoutInput,
  type UpdateWorkoutInput,
} from '../validation.js';

const log = moduleLogger('WorkoutLedger');

// Collaborators called once a workout write has committed
export interface WorkoutGoalHooks {
  onWorkoutSaved(workout: Workout): Promise<Outcome<Goal[]>>;
  onWorkoutDeleted(workout: Workout): Promise<Outcome<Goal[]>>;
  onPersonalBest(exerciseId: number, newMaxWeight: number, userId?: string): Promise<Outcome<Goal[]>>;
}

export interface WorkoutStreakHooks {
  logWorkout(date: Date | string, userId?: string): Promise<Outcome<Streak>>;
}

export interface SavedWorkout {
  workoutId: number;
  personalBests: Milestone[];
}

export class WorkoutLedger {
  private readonly sequence = new WriteLock();

  constructor(
    private readonly store: RecordStore,
    private readonly auth: AuthProvider,
    private readonly goals: WorkoutGoalHooks,
    private readonly streak: WorkoutStreakHooks
  ) {}

  /**
   * Record a finished workout with its exercises and sets in one transaction,
   * then run the derived updates: personal bests, sync entry, goals, streak.
   * Derived updates that fail are listed in `failures`; the workout stays saved.
   */
  async saveCompleteWorkout(input: SaveWorkoutInput): Promise<Outcome<SavedWorkout>> {
    const payload = parseInput(saveWorkoutSchema, input);
    const userId = resolveUserId(this.auth, payload.userId);
    const date = toDayKey(payload.date);

    for (const entry of payload.exercises) {
      if (!this.store.getExercise(entry.exerciseId)) {
        throw new ValidationError(`Unknown exercise ${entry.exerciseId}`);
      }
    }

    // Each save finishes its hooks before the next one starts, so the streak
    // and goals see workouts in submission order.
    return this.sequence.run(async (): Promise<Outcome<SavedWorkout>> => {
      const saved = await this.store.exclusive(() => {
        const { workout, maxWeights } = this.store.transaction(() => {
          const workout = this.store.insertWorkout({
            userId,
            date,
            durationMinutes: payload.durationMinutes === 0 ? undefined : payload.durationMinutes,
            notes: payload.notes,
          });

          // Heaviest positive weight per exercise in this save
          const maxWeights = new Map<number, number>();
          for (const entry of payload.exercises) {
            const workoutExerciseId = this.store.insertWorkoutExercise(workout.id, entry.exerciseId);
            for (const set of entry.sets) {
              this.store.insertWorkoutSet(workoutExerciseId, set);
              if (set.weight !== undefined && set.weight > 0) {
                maxWeights.set(entry.exerciseId, Math.max(maxWeights.get(entry.exerciseId) ?? 0, set.weight));
              }
            }
          }

          return { workout, maxWeights };
        });

        const failures: SideEffectFailure[] = [];
        const personalBests: Milestone[] = [];
        const newMaxima: Array<{ exerciseId: number; weight: number }> = [];

        for (const [exerciseId, weight] of maxWeights) {
          try {
            const previous = this.store.maxWeightForExercise(userId, exerciseId, workout.id);
            if (previous !== null && weight <= previous) {
              continue;
            }

            newMaxima.push({ exerciseId, weight });
            // The first weight on record for an exercise is a baseline. Goals
            // hear of it through onPersonalBest, but a PersonalBest milestone
            // needs an earlier workout to beat, unlike a plain running maximum.
            if (previous === null) {
              continue;
            }

            const milestone = this.recordPersonalBest(workout, exerciseId, weight);
            personalBests.push(milestone);
            const result = this.store.markForSync(TABLES.MILESTONE, milestone.id, 'INSERT');
            if (!result.ok) {
              failures.push(failure('changeQueue', result.error));
            }
            log.info({ userId, exerciseId, weight, previous }, 'New personal best');
          } catch (error) {
            log.error({ err: error, exerciseId, workoutId: workout.id }, 'Personal best check failed');
            failures.push(failure('personalBest', error));
          }
        }

        const queued = this.store.markForSync(TABLES.WORKOUT, workout.id, 'INSERT');
        if (!queued.ok) {
          failures.push(failure('changeQueue', queued.error));
        }

        return { workout, personalBests, newMaxima, failures };
      });

      // Hooks take the write lock themselves, so they run after it is released.
      const failures = [...saved.failures];

      for (const { exerciseId, weight } of saved.newMaxima) {
        failures.push(...(await this.runGoalHook(() => this.goals.onPersonalBest(exerciseId, weight, userId))));
      }

      failures.push(...(await this.runGoalHook(() => this.goals.onWorkoutSaved(saved.workout))));

      try {
        const streak = await this.streak.logWorkout(date, userId);
        failures.push(...streak.failures);
      } catch (error) {
        log.error({ err: error, workoutId: saved.workout.id }, 'Streak update failed');
        failures.push(failure('streak', error));
      }

      log.info(
        { workoutId: saved.workout.id, userId, personalBests: saved.personalBests.length },
        'Workout saved'
      );

      return {
        value: {
          workoutId: saved.workout.id,
          personalBests: saved.personalBests,
        },
        failures,
      };
    });
  }

  /**
   * Delete a workout with its exercises and sets. Resolves to false when the
   * workout does not exist.
   */
  async deleteWorkout(workoutId: number): Promise<Outcome<boolean>> {
    return this.sequence.run(async (): Promise<Outcome<boolean>> => {
      const deleted = await this.store.exclusive(() => {
        const workout = this.store.getWorkout(workoutId);
        if (!workout) {
          return null;
        }

        this.store.deleteWorkoutTree(workoutId);

        const failures: SideEffectFailure[] = [];
        const queued = this.store.markForSync(TABLES.WORKOUT, workoutId, 'DELETE');
        if (!queued.ok) {
          failures.push(failure('changeQueue', queued.error));
        }
        return { workout, failures };
      });

      if (!deleted) {
        return { value: false, failures: [] };
      }

      const failures = [...deleted.failures];
      failures.push(...(await this.runGoalHook(() => this.goals.onWorkoutDeleted(deleted.workout))));

      log.info({ workoutId }, 'Workout deleted');
      return { value: true, failures };
    });
  }

  getWorkout(workoutId: number): WorkoutDetail | null {
    return this.store.getWorkoutDetail(workoutId);
  }

  listWorkouts(userId?: string, range?: { start: Date | string; end: Date | string }): Workout[] {
    const user = resolveUserId(this.auth, userId);
    return this.store.listWorkouts(
      user,
      range ? { start: toDayKey(range.start), end: toDayKey(range.end) } : undefined
    );
  }

  async updateWorkoutDetails(workoutId: number, input: UpdateWorkoutInput): Promise<Workout> {
    const changes = parseInput(updateWorkoutSchema, input);

    return this.store.exclusive(() => {
      const workout = this.store.updateWorkout(workoutId, {
        durationMinutes: changes.durationMinutes === 0 ? null : changes.durationMinutes,
        notes: changes.notes,
      });
      if (!workout) {
        throw new NotFoundError('Workout', workoutId);
      }
      return workout;
    });
  }

  personalBests(userId?: string): PersonalBest[] {
    return this.store.personalBests(resolveUserId(this.auth, userId));
  }

  exerciseProgress(exerciseId: number, userId?: string): ProgressPoint[] {
    return this.store.exerciseProgress(resolveUserId(this.auth, userId), exerciseId);
  }

  private recordPersonalBest(workout: Workout, exerciseId: number, weight: number): Milestone {
    return this.store.transaction(() => {
      const milestone = this.store.insertMilestone({
        userId: workout.userId,
        kind: 'PersonalBest',
        exerciseId,
        value: weight,
        date: today(),
      });

      const exercise = this.store.getExercise(exerciseId);
      if (exercise) {
        this.store.insertNotification(workout.userId, 'Milestone', personalBest(exercise.name, weight));
      }
      return milestone;
    });
  }

  private async runGoalHook(hook: () => Promise<Outcome<Goal[]>>): Promise<SideEffectFailure[]> {
    try {
      const outcome = await hook();
      return outcome.failures;
    } catch (error) {
      log.error({ err: error }, 'Goal update failed');
      return [failure('goals', error)];
    }
  }
}
