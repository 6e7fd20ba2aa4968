import { z } from 'zod';
import { fromError } from 'zod-validation-error';
import { ValidationError } from './errors.js';

const dateInput = z.union([z.string().min(1), z.date()]);

export const workoutSetSchema = z.object({
  setNumber: z.number().int().positive(),
  reps: z.number().int().nonnegative().optional(),
  weight: z.number().nonnegative().optional(),
});

export const workoutExerciseSchema = z
  .object({
    exerciseId: z.number().int().positive(),
    sets: z.array(workoutSetSchema),
  })
  .superRefine((entry, ctx) => {
    const seen = new Set<number>();
    for (const set of entry.sets) {
      if (seen.has(set.setNumber)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sets'],
          message: `Duplicate set number ${set.setNumber} for exercise ${entry.exerciseId}`,
        });
      }
      seen.add(set.setNumber);
    }
  });

export const saveWorkoutSchema = z.object({
  userId: z.string().min(1).optional(),
  date: dateInput,
  durationMinutes: z.number().int().nonnegative().optional(),
  notes: z.string().optional(),
  exercises: z.array(workoutExerciseSchema),
});

export type SaveWorkoutInput = z.input<typeof saveWorkoutSchema>;

export const updateWorkoutSchema = z.object({
  durationMinutes: z.number().int().nonnegative().nullable().optional(),
  notes: z.string().nullable().optional(),
});

export type UpdateWorkoutInput = z.infer<typeof updateWorkoutSchema>;

const goalBase = {
  userId: z.string().min(1).optional(),
  targetValue: z.number().nonnegative().optional(),
  startDate: dateInput.optional(),
  endDate: dateInput,
};

const noExercise = z
  .never({ invalid_type_error: 'exerciseId is only allowed on ExerciseTarget goals' })
  .optional();

export const createGoalSchema = z.discriminatedUnion('kind', [
  z.object({
    ...goalBase,
    kind: z.literal('ExerciseTarget'),
    exerciseId: z.number({ required_error: 'ExerciseTarget goals need an exerciseId' }).int().positive(),
  }),
  z.object({
    ...goalBase,
    kind: z.literal('WorkoutFrequency'),
    exerciseId: noExercise,
  }),
  z.object({
    ...goalBase,
    kind: z.literal('WeightTarget'),
    exerciseId: noExercise,
    startingValue: z.number().positive().optional(),
  }),
]);

export type CreateGoalInput = z.input<typeof createGoalSchema>;

export const updateGoalSchema = z.object({
  targetValue: z.number().nonnegative().optional(),
  endDate: dateInput.optional(),
});

export type UpdateGoalInput = z.infer<typeof updateGoalSchema>;

export const signInSchema = z.object({
  id: z.string().min(1),
  firstName: z.string().min(1),
  lastName: z.string().min(1),
  heightCm: z.number().positive().optional(),
});

export type SignInInput = z.infer<typeof signInSchema>;

export const bodyWeightSchema = z.object({
  weightKg: z.number().positive(),
  measuredAt: z.union([z.string().datetime({ offset: true }), z.date()]).optional(),
});

export const activityDaySchema = z.object({
  date: dateInput.optional(),
});

export const dateRangeSchema = z.object({
  start: z.string().min(1),
  end: z.string().min(1),
});

export const milestoneKindSchema = z.enum(['PersonalBest', 'LongestStreak', 'GoalAchieved']);

/**
 * Parse `input` or throw a ValidationError carrying a readable summary of
 * every issue.
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(fromError(result.error).toString());
  }
  return result.data;
}
