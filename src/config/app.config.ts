import path from 'node:path';

import { z } from 'zod';

import { ValidationError } from '@/lib/errors';

const DEFAULT_SENTENCES_PATH = path.join('data', 'sentences.txt');

const appEnvSchema = z.object({
  TYPING_SENTENCES_PATH: z.string().trim().min(1).optional(),
});

export interface AppConfig {
  /** Absolute path of the tiered sentence resource. */
  readonly sentencesPath: string;
}

export const loadAppConfig = (
  env: Readonly<Record<string, string | undefined>> = process.env,
  cwd: string = process.cwd(),
): AppConfig => {
  const result = appEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ValidationError('Invalid application environment', result.error.flatten());
  }

  const configured = result.data.TYPING_SENTENCES_PATH ?? DEFAULT_SENTENCES_PATH;
  return {
    sentencesPath: path.resolve(cwd, configured),
  };
};
