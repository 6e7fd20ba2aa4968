import {
  GoalState,
  type ActivityKind,
  type ChangeQueueEntry,
  type DailyLog,
  type Exercise,
  type Goal,
  type GoalKind,
  type Milestone,
  type MilestoneKind,
  type Notification,
  type NotificationKind,
  type Streak,
  type SyncOperation,
  type User,
  type UserMetric,
  type Workout,
  type WorkoutSet,
} from '@fitledger/shared';

// Raw column shapes as better-sqlite3 returns them. Only this module and the
// store see snake_case; everything above works with the shared records.

export interface UserRow {
  user_id: string;
  first_name: string;
  last_name: string;
  height_cm: number | null;
  registration_date: string;
  last_login: string | null;
}

export interface UserMetricRow {
  metric_id: number;
  user_id: string;
  weight_kg: number;
  measured_at: string;
}

export interface ExerciseRow {
  exercise_id: number;
  name: string;
  muscle_group: string | null;
  description: string | null;
}

export interface WorkoutRow {
  workout_id: number;
  user_id: string;
  date: string;
  duration: number | null;
  notes: string | null;
}

export interface WorkoutSetRow {
  workout_set_id: number;
  workout_exercise_id: number;
  set_number: number;
  reps: number | null;
  weight: number | null;
}

export interface GoalRow {
  goal_id: number;
  user_id: string;
  type: GoalKind;
  exercise_id: number | null;
  target_value: number | null;
  start_date: string;
  end_date: string;
  achieved: number;
  current_progress: number | null;
  starting_weight: number | null;
  achieved_date: string | null;
}

export interface DailyLogRow {
  daily_log_id: number;
  user_id: string;
  date: string;
  activity_type: ActivityKind;
  notes: string | null;
}

export interface StreakRow {
  user_id: string;
  current_streak: number | null;
  longest_streak: number | null;
  last_activity_date: string | null;
  last_workout_date: string | null;
}

export interface MilestoneRow {
  milestone_id: number;
  user_id: string;
  type: MilestoneKind;
  exercise_id: number | null;
  value: number | null;
  date: string;
}

export interface NotificationRow {
  notification_id: number;
  user_id: string;
  type: NotificationKind;
  message: string;
  timestamp: string;
  is_read: number;
}

export interface SyncQueueRow {
  id: number;
  table_name: string;
  record_id: string;
  operation: SyncOperation;
  timestamp: number;
  synced: number;
  retry_count: number | null;
  last_error: string | null;
}

function optional<T>(value: T | null): T | undefined {
  return value === null ? undefined : value;
}

function toGoalState(value: number): GoalState {
  switch (value) {
    case GoalState.Achieved:
      return GoalState.Achieved;
    case GoalState.Expired:
      return GoalState.Expired;
    default:
      return GoalState.Active;
  }
}

export function toUser(row: UserRow): User {
  return {
    id: row.user_id,
    firstName: row.first_name,
    lastName: row.last_name,
    heightCm: optional(row.height_cm),
    registrationDate: row.registration_date,
    lastLogin: optional(row.last_login),
  };
}

export function toUserMetric(row: UserMetricRow): UserMetric {
  return {
    id: row.metric_id,
    userId: row.user_id,
    weightKg: row.weight_kg,
    measuredAt: row.measured_at,
  };
}

export function toExercise(row: ExerciseRow): Exercise {
  return {
    id: row.exercise_id,
    name: row.name,
    muscleGroup: row.muscle_group ?? '',
    description: optional(row.description),
  };
}

export function toWorkout(row: WorkoutRow): Workout {
  return {
    id: row.workout_id,
    userId: row.user_id,
    date: row.date,
    durationMinutes: optional(row.duration),
    notes: optional(row.notes),
  };
}

export function toWorkoutSet(row: WorkoutSetRow): WorkoutSet {
  return {
    id: row.workout_set_id,
    workoutExerciseId: row.workout_exercise_id,
    setNumber: row.set_number,
    reps: optional(row.reps),
    weight: optional(row.weight),
  };
}

export function toGoal(row: GoalRow): Goal {
  return {
    id: row.goal_id,
    userId: row.user_id,
    kind: row.type,
    exerciseId: optional(row.exercise_id),
    targetValue: optional(row.target_value),
    startDate: row.start_date,
    endDate: row.end_date,
    state: toGoalState(row.achieved),
    currentProgress: row.current_progress ?? 0,
    startingValue: optional(row.starting_weight),
    achievedDate: optional(row.achieved_date),
  };
}

export function toDailyLog(row: DailyLogRow): DailyLog {
  return {
    id: row.daily_log_id,
    userId: row.user_id,
    date: row.date,
    activity: row.activity_type,
    notes: optional(row.notes),
  };
}

export function toStreak(row: StreakRow): Streak {
  return {
    userId: row.user_id,
    currentStreak: row.current_streak ?? 0,
    longestStreak: row.longest_streak ?? 0,
    lastActivityDate: optional(row.last_activity_date),
    lastWorkoutDate: optional(row.last_workout_date),
  };
}

export function toMilestone(row: MilestoneRow): Milestone {
  return {
    id: row.milestone_id,
    userId: row.user_id,
    kind: row.type,
    exerciseId: optional(row.exercise_id),
    value: optional(row.value),
    date: row.date,
  };
}

export function toNotification(row: NotificationRow): Notification {
  return {
    id: row.notification_id,
    userId: row.user_id,
    kind: row.type,
    message: row.message,
    timestamp: row.timestamp,
    read: row.is_read === 1,
  };
}

export function toChangeQueueEntry(row: SyncQueueRow): ChangeQueueEntry {
  return {
    id: row.id,
    tableName: row.table_name,
    recordId: row.record_id,
    operation: row.operation,
    timestamp: row.timestamp,
    synced: row.synced === 1,
    retryCount: row.retry_count ?? 0,
    lastError: optional(row.last_error),
  };
}
