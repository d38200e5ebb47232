import type { Difficulty, ThemeName, ThemePalette, TypingPreferences } from '@/types';

export const SESSION_DURATION_SECONDS = 300;
export const TICK_INTERVAL_MS = 1000;
export const CHARACTERS_PER_WORD = 5; // standard "word" length for WPM
export const LIVE_WPM_WARMUP_SECONDS = 1;

export const PREFERENCES_STORAGE_KEY = 'typing_test_preferences';

export const DEFAULT_TYPING_PREFERENCES: TypingPreferences = {
  difficulty: 'EASY',
  theme: 'light',
};

export const DIFFICULTY_LABELS: Readonly<Record<Difficulty, string>> = {
  EASY: 'Easy',
  MEDIUM: 'Medium',
  HARD: 'Hard',
};

export const THEME_PALETTES: Readonly<Record<ThemeName, ThemePalette>> = {
  light: {
    page: 'bg-neutral-100',
    panel: 'bg-white',
    text: 'text-black',
    inverted: 'bg-neutral-800 text-white',
    correct: 'text-green-700',
    incorrect: 'text-red-700',
    extra: 'text-neutral-500',
    pending: 'text-neutral-400',
  },
  dark: {
    page: 'bg-neutral-800',
    panel: 'bg-neutral-600',
    text: 'text-white',
    inverted: 'bg-neutral-200 text-black',
    correct: 'text-green-400',
    incorrect: 'text-orange-500',
    extra: 'text-neutral-400',
    pending: 'text-neutral-300',
  },
};
