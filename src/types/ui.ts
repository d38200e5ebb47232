import type { Difficulty } from './domain';

/** Colour scheme applied to the whole page. */
export type ThemeName = 'light' | 'dark';

/** Persisted user choices that outlive a single session. */
export interface TypingPreferences {
  readonly difficulty: Difficulty;
  readonly theme: ThemeName;
}

/** Tailwind classes used to paint one theme. */
export interface ThemePalette {
  readonly page: string;
  readonly panel: string;
  readonly text: string;
  readonly inverted: string;
  readonly correct: string;
  readonly incorrect: string;
  readonly extra: string;
  readonly pending: string;
}
