'use client';

import { shallow } from 'zustand/shallow';

import { useAppStore } from '@/store';
import type { TypingSessionView } from '@/store';
import type { Difficulty, Session, TypingResult } from '@/types';

export interface UseTypingSessionStateResult extends TypingSessionView {
  readonly session: Session | null;
  readonly difficulty: Difficulty;
  readonly availableDifficulties: readonly Difficulty[];
  readonly lastResult?: TypingResult;
  readonly sessionError?: string;
}

export const useTypingSessionState = (): UseTypingSessionStateResult =>
  useAppStore(
    (state) => ({
      session: state.session,
      difficulty: state.difficulty,
      availableDifficulties: state.availableDifficulties,
      lastResult: state.lastResult,
      sessionError: state.sessionError,
      classifications: state.classifications,
      isComplete: state.isComplete,
      liveWpm: state.liveWpm,
      elapsedSeconds: state.elapsedSeconds,
      remainingSeconds: state.remainingSeconds,
    }),
    shallow,
  );

export interface UseTypingSessionActionsResult {
  readonly selectDifficulty: (value: unknown) => Difficulty;
  readonly startTest: () => Session;
  readonly typeText: (typed: string) => Session | null;
  readonly resetTest: () => Session | null;
  readonly acknowledgeResults: () => Session;
}

export const useTypingSessionActions = (): UseTypingSessionActionsResult =>
  useAppStore(
    (state) => ({
      selectDifficulty: state.selectDifficulty,
      startTest: state.startTest,
      typeText: state.typeText,
      resetTest: state.resetTest,
      acknowledgeResults: state.acknowledgeResults,
    }),
    shallow,
  );
