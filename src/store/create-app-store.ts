import { createStore, type StoreApi } from 'zustand/vanilla';

import { DEFAULT_TYPING_PREFERENCES } from '@/config/typing.config';
import type { SentenceBank } from '@/lib/services';
import type { TimerScheduler } from '@/lib/typing';
import type { Clock, Difficulty, ThemeName } from '@/types';

import { createPreferencesSlice, type PreferencesSlice } from './slices/preferences.slice';
import { createTypingSessionSlice, type TypingSessionSlice } from './slices/typing-session.slice';

export type AppStore = TypingSessionSlice & PreferencesSlice;

export interface CreateAppStoreOptions {
  readonly sentenceBank: SentenceBank;
  readonly initialDifficulty?: Difficulty;
  readonly initialTheme?: ThemeName;
  readonly clock?: Clock;
  readonly scheduler?: TimerScheduler;
  readonly tickIntervalMs?: number;
  readonly durationLimitSeconds?: number;
}

export const createAppStore = ({
  sentenceBank,
  initialDifficulty = DEFAULT_TYPING_PREFERENCES.difficulty,
  initialTheme = DEFAULT_TYPING_PREFERENCES.theme,
  clock,
  scheduler,
  tickIntervalMs,
  durationLimitSeconds,
}: CreateAppStoreOptions): StoreApi<AppStore> =>
  createStore<AppStore>((set, get) => {
    const typingSessionSlice = createTypingSessionSlice({
      set: (partial, replace) => set(partial as Partial<AppStore>, replace),
      get,
      sentenceBank,
      initialDifficulty,
      clock,
      scheduler,
      tickIntervalMs,
      durationLimitSeconds,
    });

    const preferencesSlice = createPreferencesSlice({
      set: (partial, replace) => set(partial as Partial<AppStore>, replace),
      initialTheme,
    });

    return {
      ...typingSessionSlice,
      ...preferencesSlice,
    };
  });
