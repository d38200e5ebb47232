'use client';

import React, { useCallback, useRef, type ChangeEvent } from 'react';

import { DifficultySelect } from '@/components/ui/forms/DifficultySelect';
import { ThemeToggle } from '@/components/ui/forms/ThemeToggle';
import { ClassifiedText } from '@/components/ui/typing/ClassifiedText';
import { ResultsDialog } from '@/components/ui/typing/ResultsDialog';
import { SessionStats } from '@/components/ui/typing/SessionStats';
import { TimeProgress } from '@/components/ui/typing/TimeProgress';
import { TypingControls } from '@/components/ui/typing/TypingControls';
import { THEME_PALETTES } from '@/config/typing.config';
import { useTypingPreferences } from '@/hooks/useTypingPreferences';
import { useTypingSessionActions, useTypingSessionState } from '@/hooks/useTypingSession';

export function TypingTest(): JSX.Element {
  const state = useTypingSessionState();
  const { startTest, resetTest, typeText, acknowledgeResults } = useTypingSessionActions();
  const { preferences, setTheme, setDifficulty } = useTypingPreferences();
  const inputRef = useRef<HTMLTextAreaElement | null>(null);

  const palette = THEME_PALETTES[preferences.theme];
  const { session } = state;
  const status = session?.status ?? null;

  const focusInput = (): void => {
    inputRef.current?.focus();
  };

  const handleStart = useCallback(() => {
    try {
      startTest();
      focusInput();
    } catch (error) {
      console.error('[TypingTest] Failed to start test', error);
    }
  }, [startTest]);

  const handleReset = useCallback(() => {
    try {
      resetTest();
      focusInput();
    } catch (error) {
      console.error('[TypingTest] Failed to reset test', error);
    }
  }, [resetTest]);

  const handleChange = useCallback(
    (event: ChangeEvent<HTMLTextAreaElement>) => {
      try {
        typeText(event.target.value);
      } catch (error) {
        console.error('[TypingTest] Failed to process input', error);
      }
    },
    [typeText],
  );

  const handleAcknowledge = useCallback(() => {
    try {
      acknowledgeResults();
      focusInput();
    } catch (error) {
      console.error('[TypingTest] Failed to start next test', error);
    }
  }, [acknowledgeResults]);

  return (
    <div data-theme={preferences.theme} className={`min-h-screen ${palette.page} ${palette.text} flex flex-col`}>
      <header className="grid grid-cols-3 items-center px-6 py-4">
        <ThemeToggle value={preferences.theme} onChange={setTheme} activeClassName={palette.inverted} />
        <div className="justify-self-center">
          <DifficultySelect
            value={state.difficulty}
            available={state.availableDifficulties}
            disabled={status === 'running'}
            onChange={setDifficulty}
            className={palette.inverted}
          />
        </div>
        <SessionStats
          liveWpm={state.liveWpm}
          remainingSeconds={state.remainingSeconds}
          className={`justify-self-end ${palette.inverted}`}
        />
      </header>

      {state.sessionError && (
        <div role="alert" className="mx-6 mb-4 rounded-xl bg-red-100 px-4 py-3 text-red-800">
          {state.sessionError}
        </div>
      )}

      <main className="flex-1 flex flex-col gap-6 px-6">
        <section aria-label="Target sentence" className={`${palette.panel} rounded-3xl p-6 text-lg`}>
          {session ? session.sentence.text : 'Press Start Test to get a sentence.'}
        </section>

        <div className={`${palette.panel} rounded-3xl p-6 space-y-4`}>
          <textarea
            ref={inputRef}
            aria-label="Typing input"
            value={session?.typed ?? ''}
            onChange={handleChange}
            disabled={!session || status === 'finished'}
            rows={4}
            spellCheck={false}
            autoComplete="off"
            className={`w-full resize-none bg-transparent font-mono text-lg outline-none ${palette.text}`}
          />
          <ClassifiedText text={session?.typed ?? ''} classifications={state.classifications} palette={palette} />
        </div>

        <TimeProgress
          elapsedSeconds={state.elapsedSeconds}
          limitSeconds={session?.durationLimitSeconds ?? state.remainingSeconds}
        />
      </main>

      <footer className="py-6">
        <TypingControls
          status={status}
          startDisabled={Boolean(state.sessionError) && !session}
          onStart={handleStart}
          onReset={handleReset}
        />
      </footer>

      {state.lastResult && <ResultsDialog result={state.lastResult} onAcknowledge={handleAcknowledge} />}
    </div>
  );
}
