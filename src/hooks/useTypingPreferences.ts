'use client';

import { useCallback, useEffect, useState } from 'react';

import { DEFAULT_TYPING_PREFERENCES, PREFERENCES_STORAGE_KEY } from '@/config/typing.config';
import { difficultySchema, themeNameSchema, typingPreferencesSchema } from '@/lib/validators';
import { useAppStore } from '@/store';
import type { Difficulty, ThemeName, TypingPreferences } from '@/types';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

export const normalizeTypingPreferences = (
  raw: unknown,
  fallback: TypingPreferences,
): TypingPreferences => {
  const parsed = typingPreferencesSchema.safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }
  if (!isRecord(raw)) {
    return fallback;
  }

  const difficulty = difficultySchema.safeParse(raw['difficulty']);
  const theme = themeNameSchema.safeParse(raw['theme']);
  return {
    difficulty: difficulty.success ? difficulty.data : fallback.difficulty,
    theme: theme.success ? theme.data : fallback.theme,
  };
};

export interface UseTypingPreferencesResult {
  readonly preferences: TypingPreferences;
  readonly setTheme: (theme: ThemeName) => void;
  readonly setDifficulty: (difficulty: string) => Difficulty | null;
}

export function useTypingPreferences(
  storageKey: string = PREFERENCES_STORAGE_KEY,
): UseTypingPreferencesResult {
  const theme = useAppStore((state) => state.theme);
  const difficulty = useAppStore((state) => state.difficulty);
  const applyTheme = useAppStore((state) => state.setTheme);
  const selectDifficulty = useAppStore((state) => state.selectDifficulty);
  const [loaded, setLoaded] = useState(false);

  useEffect(() => {
    if (typeof window === 'undefined') {
      return;
    }

    try {
      const raw = window.localStorage.getItem(storageKey);
      if (raw) {
        const stored = normalizeTypingPreferences(JSON.parse(raw), DEFAULT_TYPING_PREFERENCES);
        applyTheme(stored.theme);
        selectDifficulty(stored.difficulty);
      }
    } catch (error) {
      console.warn('[Preferences] Failed to load preferences from storage', error);
    } finally {
      setLoaded(true);
    }
  }, [storageKey, applyTheme, selectDifficulty]);

  useEffect(() => {
    if (!loaded || typeof window === 'undefined') {
      return;
    }

    try {
      const next: TypingPreferences = { difficulty, theme };
      window.localStorage.setItem(storageKey, JSON.stringify(next));
    } catch (error) {
      console.warn('[Preferences] Failed to persist preferences to storage', error);
    }
  }, [loaded, difficulty, theme, storageKey]);

  const setTheme = useCallback(
    (next: ThemeName) => {
      applyTheme(next);
    },
    [applyTheme],
  );

  const setDifficulty = useCallback(
    (next: string): Difficulty | null => {
      try {
        return selectDifficulty(next);
      } catch (error) {
        console.warn('[Preferences] Difficulty change rejected', error);
        return null;
      }
    },
    [selectDifficulty],
  );

  return {
    preferences: { difficulty, theme },
    setTheme,
    setDifficulty,
  };
}
