import { z } from 'zod';

import { InvalidDifficultyError } from '@/lib/errors';
import { DIFFICULTIES, type Difficulty } from '@/types';

export const difficultySchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
  z.enum(DIFFICULTIES),
);

/**
 * Boundary check for difficulty values coming from the UI or the sentence
 * resource. Accepts any casing of the tier name.
 */
export const parseDifficulty = (value: unknown): Difficulty => {
  const result = difficultySchema.safeParse(value);
  if (!result.success) {
    throw new InvalidDifficultyError(value, result.error.flatten());
  }
  return result.data;
};
