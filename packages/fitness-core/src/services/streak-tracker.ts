import {
  STREAK_CONFIG,
  TABLES,
  type ActivityKind,
  type DailyLog,
  type DayKey,
  type Milestone,
  type Streak,
  type SyncOperation,
} from '@fitledger/shared';
import { resolveUserId, type AuthProvider } from '../auth.js';
import type { RecordStore } from '../db/store.js';
import { moduleLogger } from '../logger.js';
import { streakMilestone } from '../messages.js';
import { failure, type Outcome, type SideEffectFailure } from '../outcome.js';
import { daysBetween, laterDay, toDayKey, today } from '../utils/dates.js';

const log = moduleLogger('StreakTracker');

export function emptyStreak(userId: string): Streak {
  return { userId, currentStreak: 0, longestStreak: 0 };
}

/**
 * Length of the run of consecutive days that ends at the first entry of
 * `days` (newest first, no duplicates).
 */
export function consecutiveRun(days: DayKey[]): number {
  let run = 0;
  for (const [index, day] of days.entries()) {
    const newer = days[index - 1];
    if (newer !== undefined && daysBetween(day, newer) !== 1) {
      break;
    }
    run++;
  }
  return run;
}

/**
 * Next streak state after an activity on `day`.
 *
 * A log dated before the last activity (a backfill) keeps the current count;
 * callers holding the daily log rebuild it with `consecutiveRun`.
 */
export function advanceStreak(streak: Streak, day: DayKey, activity: ActivityKind): Streak {
  const last = streak.lastActivityDate;
  let current: number;

  if (last === undefined) {
    current = 1;
  } else {
    const gap = daysBetween(last, day);
    if (gap === 1) {
      current = streak.currentStreak + 1;
    } else if (gap === 0) {
      current = Math.max(streak.currentStreak, 1);
    } else if (gap > 1) {
      current = 1;
    } else {
      current = streak.currentStreak;
    }
  }

  return {
    userId: streak.userId,
    currentStreak: current,
    longestStreak: Math.max(streak.longestStreak, current),
    lastActivityDate: laterDay(last, day),
    lastWorkoutDate: activity === 'workout' ? laterDay(streak.lastWorkoutDate, day) : streak.lastWorkoutDate,
  };
}

interface DailyLogWrite {
  dailyLog: DailyLog;
  operation: SyncOperation | null; // null when the stored row already said as much
}

export class StreakTracker {
  constructor(
    private readonly store: RecordStore,
    private readonly auth: AuthProvider
  ) {}

  async logWorkout(date: Date | string, userId?: string): Promise<Outcome<Streak>> {
    return this.logActivity('workout', date, userId);
  }

  async logRest(date: Date | string, userId?: string): Promise<Outcome<Streak>> {
    return this.logActivity('rest', date, userId);
  }

  /**
   * Streak for the user; an empty one until the first log.
   */
  getStreak(userId?: string): Streak {
    const user = resolveUserId(this.auth, userId);
    return this.store.getStreak(user) ?? emptyStreak(user);
  }

  /**
   * Zero the current streak when more than a day has passed without activity.
   * Returns the streak as stored afterwards.
   */
  async performDailyCheck(userId?: string): Promise<Streak> {
    const user = resolveUserId(this.auth, userId);

    return this.store.exclusive(() => {
      const streak = this.getStreak(user);
      if (streak.currentStreak === 0 || streak.lastActivityDate === undefined) {
        return streak;
      }

      if (daysBetween(streak.lastActivityDate, today()) <= 1) {
        return streak;
      }

      log.info({ userId: user, lastActivityDate: streak.lastActivityDate }, 'Streak broken');
      return this.store.saveStreak({ ...streak, currentStreak: 0 });
    });
  }

  history(start: Date | string, end: Date | string, userId?: string): DailyLog[] {
    const user = resolveUserId(this.auth, userId);
    return this.store.listDailyLogs(user, toDayKey(start), toDayKey(end));
  }

  /**
   * Make sure every day with a saved workout in [start, end] has a workout
   * log. Streak counts are left as they are. Returns the number of days written.
   */
  async backfillFromWorkouts(start: Date | string, end: Date | string, userId?: string): Promise<Outcome<number>> {
    const user = resolveUserId(this.auth, userId);
    const from = toDayKey(start);
    const to = toDayKey(end);

    return this.store.exclusive(() => {
      const writes = this.store.transaction(() =>
        this.store
          .workoutDates(user, from, to)
          .map(day => this.writeDailyLog(user, day, 'workout'))
          .filter(write => write.operation !== null)
      );

      const failures: SideEffectFailure[] = [];
      for (const write of writes) {
        this.enqueue(TABLES.DAILY_LOG, write.dailyLog.id, write.operation, failures);
      }

      log.info({ userId: user, from, to, written: writes.length }, 'Backfilled daily logs');
      return { value: writes.length, failures };
    });
  }

  private async logActivity(activity: ActivityKind, date: Date | string, userId?: string): Promise<Outcome<Streak>> {
    const user = resolveUserId(this.auth, userId);
    const day = toDayKey(date);

    return this.store.exclusive(() => {
      const result = this.store.transaction(() => {
        const write = this.writeDailyLog(user, day, activity);
        const previous = this.store.getStreak(user) ?? emptyStreak(user);
        const streak = this.store.saveStreak(this.nextStreak(previous, day, activity));
        const milestones = this.recordMilestones(previous, streak, day);
        return { write, streak, milestones };
      });

      const failures: SideEffectFailure[] = [];
      this.enqueue(TABLES.DAILY_LOG, result.write.dailyLog.id, result.write.operation, failures);
      this.enqueue(TABLES.STREAK, user, 'UPDATE', failures);
      for (const milestone of result.milestones) {
        this.enqueue(TABLES.MILESTONE, milestone.id, 'INSERT', failures);
      }

      log.debug({ userId: user, day, activity, current: result.streak.currentStreak }, 'Logged activity');
      return { value: result.streak, failures };
    });
  }

  // A backdated log may join two runs, so the count is rebuilt from the daily log.
  private nextStreak(previous: Streak, day: DayKey, activity: ActivityKind): Streak {
    const next = advanceStreak(previous, day, activity);
    // A streak the daily check already broke stays broken
    if (previous.lastActivityDate === undefined || day >= previous.lastActivityDate || previous.currentStreak === 0) {
      return next;
    }

    const current = consecutiveRun(this.store.loggedDaysUntil(previous.userId, previous.lastActivityDate));
    return { ...next, currentStreak: current, longestStreak: Math.max(next.longestStreak, current) };
  }

  // Workout is never downgraded to rest for the same day.
  private writeDailyLog(userId: string, day: DayKey, activity: ActivityKind): DailyLogWrite {
    const existing = this.store.getDailyLog(userId, day);
    if (!existing) {
      return { dailyLog: this.store.insertDailyLog(userId, day, activity), operation: 'INSERT' };
    }

    if (existing.activity === 'rest' && activity === 'workout') {
      this.store.setDailyLogActivity(existing.id, 'workout');
      return { dailyLog: { ...existing, activity: 'workout' }, operation: 'UPDATE' };
    }

    return { dailyLog: existing, operation: null };
  }

  private recordMilestones(previous: Streak, next: Streak, day: DayKey): Milestone[] {
    const reached = STREAK_CONFIG.MILESTONE_DAYS.filter(
      days => previous.currentStreak < days && next.currentStreak >= days
    );

    return reached.map(days => {
      const milestone = this.store.insertMilestone({
        userId: next.userId,
        kind: 'LongestStreak',
        value: days,
        date: day,
      });
      this.store.insertNotification(next.userId, 'NewStreak', streakMilestone(days));
      log.info({ userId: next.userId, days }, 'Streak milestone reached');
      return milestone;
    });
  }

  private enqueue(
    table: string,
    recordId: string | number,
    operation: SyncOperation | null,
    failures: SideEffectFailure[]
  ): void {
    if (operation === null) return;

    const result = this.store.markForSync(table, recordId, operation);
    if (!result.ok) {
      failures.push(failure('changeQueue', result.error));
    }
  }
}
