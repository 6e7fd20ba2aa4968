// Goal kinds and their lifecycle
export type GoalKind = 'ExerciseTarget' | 'WorkoutFrequency' | 'WeightTarget';

// Persisted as the integer in the goal.achieved column
export enum GoalState {
  Active = 0,
  Achieved = 1,
  Expired = 2,
}

export type ActivityKind = 'workout' | 'rest';

export type MilestoneKind = 'PersonalBest' | 'LongestStreak' | 'GoalAchieved';

export type NotificationKind = 'GoalProgress' | 'NewStreak' | 'Milestone';

export type SyncOperation = 'INSERT' | 'UPDATE' | 'DELETE';

// Day keys are local calendar days formatted YYYY-MM-DD
export type DayKey = string;

export interface User {
  id: string;
  firstName: string;
  lastName: string;
  heightCm?: number;
  registrationDate: string; // ISO 8601
  lastLogin?: string; // ISO 8601
}

export interface UserMetric {
  id: number;
  userId: string;
  weightKg: number;
  measuredAt: string; // ISO 8601
}

export interface Exercise {
  id: number;
  name: string;
  muscleGroup: string;
  description?: string;
}

export interface Workout {
  id: number;
  userId: string;
  date: DayKey;
  durationMinutes?: number;
  notes?: string;
}

export interface WorkoutExercise {
  id: number;
  workoutId: number;
  exerciseId: number;
}

export interface WorkoutSet {
  id: number;
  workoutExerciseId: number;
  setNumber: number;
  reps?: number;
  weight?: number; // kg
}

// Workout with its exercises and their sets, as shown on a detail screen
export interface WorkoutDetail extends Workout {
  exercises: Array<{
    workoutExerciseId: number;
    exercise: Exercise;
    sets: WorkoutSet[];
  }>;
}

export interface Goal {
  id: number;
  userId: string;
  kind: GoalKind;
  exerciseId?: number; // required iff kind === 'ExerciseTarget'
  targetValue?: number;
  startDate: DayKey;
  endDate: DayKey;
  state: GoalState;
  currentProgress: number;
  startingValue?: number; // WeightTarget baseline
  achievedDate?: DayKey;
}

export interface DailyLog {
  id: number;
  userId: string;
  date: DayKey;
  activity: ActivityKind;
  notes?: string;
}

export interface Streak {
  userId: string;
  currentStreak: number;
  longestStreak: number;
  lastActivityDate?: DayKey;
  lastWorkoutDate?: DayKey;
}

export interface Milestone {
  id: number;
  userId: string;
  kind: MilestoneKind;
  exerciseId?: number;
  value?: number;
  date: DayKey;
}

export interface Notification {
  id: number;
  userId: string;
  kind: NotificationKind;
  message: string;
  timestamp: string; // ISO 8601
  read: boolean;
}

export interface ChangeQueueEntry {
  id: number;
  tableName: string;
  recordId: string;
  operation: SyncOperation;
  timestamp: number; // epoch ms
  synced: boolean;
  retryCount: number;
  lastError?: string;
}

export interface PersonalBest {
  exerciseId: number;
  weight: number;
}

export interface ProgressPoint {
  date: DayKey;
  weight: number;
}

export interface SyncQueueStats {
  pending: number;
  synced: number;
  failing: number; // pending entries that have been retried at least once
}
