import fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { fromError } from 'zod-validation-error';
import { ValidationError } from '../errors.js';
import { moduleLogger } from '../logger.js';
import type { RecordStore } from './store.js';

const log = moduleLogger('seed');

const SEED_FILE = fileURLToPath(new URL('../../data/exercises.json', import.meta.url));

const exerciseSeedSchema = z.array(
  z.object({
    name: z.string().min(1),
    muscleGroup: z.string().min(1),
    description: z.string().optional(),
  })
);

export type ExerciseSeed = z.infer<typeof exerciseSeedSchema>;

export function loadExerciseSeed(file: string = SEED_FILE): ExerciseSeed {
  const parsed = exerciseSeedSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')));
  if (!parsed.success) {
    throw new ValidationError(fromError(parsed.error).toString());
  }
  return parsed.data;
}

/**
 * Fill the exercise catalog on first open. Returns how many rows were added;
 * a catalog that already has rows is left alone.
 */
export function seedExercises(store: RecordStore, seed: ExerciseSeed = loadExerciseSeed()): number {
  if (store.countExercises() > 0) {
    return 0;
  }

  store.transaction(() => {
    for (const exercise of seed) {
      store.insertExercise(exercise);
    }
  });

  log.info({ count: seed.length }, 'Seeded exercise catalog');
  return seed.length;
}
