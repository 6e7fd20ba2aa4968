import type { Goal } from '@fitledger/shared';

// Text of in-app notifications. Delivery reads these rows from the notification table.

export function goalName(goal: Goal, exerciseName?: string): string {
  switch (goal.kind) {
    case 'ExerciseTarget':
      return exerciseName ?? 'exercise';
    case 'WorkoutFrequency':
      return 'workout frequency';
    case 'WeightTarget':
      return 'weight';
  }
}

export function goalAchieved(name: string): string {
  return `Congratulations! You've reached your ${name} goal!`;
}

export function streakMilestone(days: number): string {
  return `${days}-day streak achieved! Keep it up!`;
}

export function personalBest(exerciseName: string, weight: number): string {
  return `New personal best on ${exerciseName}: ${weight.toFixed(1)}kg!`;
}
