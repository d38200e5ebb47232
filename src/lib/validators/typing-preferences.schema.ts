import { z } from 'zod';

import { difficultySchema } from './difficulty.schema';

export const themeNameSchema = z.enum(['light', 'dark']);

export const typingPreferencesSchema = z.object({
  difficulty: difficultySchema,
  theme: themeNameSchema,
});

