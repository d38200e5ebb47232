import { SESSION_DURATION_SECONDS, TICK_INTERVAL_MS } from '@/config/typing.config';
import { InvalidTransitionError, ensureAppError } from '@/lib/errors';
import type { SentenceBank } from '@/lib/services';
import {
  classify,
  createRepeatingTimer,
  createSession,
  getLiveWpm,
  getRemainingSeconds,
  sessionReducer,
  type SessionAction,
  type TimerScheduler,
} from '@/lib/typing';
import { parseDifficulty } from '@/lib/validators';
import type {
  CharacterClassification,
  Clock,
  Difficulty,
  Sentence,
  Session,
  TypingResult,
} from '@/types';

import type { StoreGetter, StoreSetter } from '../types';

export interface TypingSessionView {
  classifications: readonly CharacterClassification[];
  isComplete: boolean;
  liveWpm: number;
  elapsedSeconds: number;
  remainingSeconds: number;
}

export interface TypingSessionSlice extends TypingSessionView {
  difficulty: Difficulty;
  availableDifficulties: readonly Difficulty[];
  session: Session | null;
  lastResult?: TypingResult;
  sessionError?: string;
  selectDifficulty: (value: unknown) => Difficulty;
  startTest: () => Session;
  typeText: (typed: string) => Session | null;
  tick: () => Session | null;
  resetTest: () => Session | null;
  acknowledgeResults: () => Session;
  disposeTimer: () => void;
}

export interface CreateTypingSessionSliceParams {
  set: StoreSetter<TypingSessionSlice>;
  get: StoreGetter<TypingSessionSlice>;
  sentenceBank: SentenceBank;
  initialDifficulty: Difficulty;
  clock?: Clock;
  scheduler?: TimerScheduler;
  tickIntervalMs?: number;
  durationLimitSeconds?: number;
}

const mapErrorMessage = (error: unknown): string => {
  const appError = ensureAppError(error);
  return appError.expose ? appError.message : 'Unable to process typing session request.';
};

const idleView = (durationLimitSeconds: number): TypingSessionView => ({
  classifications: [],
  isComplete: false,
  liveWpm: 0,
  elapsedSeconds: 0,
  remainingSeconds: durationLimitSeconds,
});

const deriveView = (session: Session): TypingSessionView => {
  const { classifications, isComplete } = classify(session.typed, session.sentence.text);
  return {
    classifications,
    isComplete,
    liveWpm: getLiveWpm(session),
    elapsedSeconds: session.elapsedSeconds,
    remainingSeconds: getRemainingSeconds(session),
  };
};

export const createTypingSessionSlice = ({
  set,
  get,
  sentenceBank,
  initialDifficulty,
  clock = Date.now,
  scheduler,
  tickIntervalMs = TICK_INTERVAL_MS,
  durationLimitSeconds = SESSION_DURATION_SECONDS,
}: CreateTypingSessionSliceParams): TypingSessionSlice => {
  let nextSessionId = 1;
  const timer = createRepeatingTimer(
    () => {
      get().tick();
    },
    tickIntervalMs,
    scheduler,
  );

  const runAction = <T>(action: () => T): T => {
    try {
      return action();
    } catch (error) {
      const appError = ensureAppError(error);
      console.error('[TypingSession] Action failed', appError.code, appError.message);
      set({ sessionError: mapErrorMessage(appError) });
      throw appError;
    }
  };

  const install = (sentence: Sentence): Session => {
    timer.cancel();
    const session = createSession(sentence, nextSessionId, durationLimitSeconds);
    nextSessionId += 1;
    set({ session, ...deriveView(session), sessionError: undefined });
    return session;
  };

  const dispatch = (action: SessionAction): Session | null => {
    const previous = get().session;
    if (!previous) {
      return null;
    }

    const next = sessionReducer(previous, action);
    if (next === previous) {
      return previous;
    }

    if (next.status === 'running') {
      timer.start();
    } else {
      timer.cancel();
    }

    if (previous.status !== 'finished' && next.result) {
      console.info(
        '[TypingSession] Session finished',
        next.result.finishReason,
        `wpm=${next.result.netWpm.toFixed(1)}`,
        `errors=${next.result.characterErrors}`,
      );
      set({ session: next, ...deriveView(next), lastResult: next.result });
      return next;
    }

    set({ session: next, ...deriveView(next) });
    return next;
  };

  return {
    ...idleView(durationLimitSeconds),
    difficulty: initialDifficulty,
    availableDifficulties: sentenceBank.tiers(),
    session: null,

    selectDifficulty: (value: unknown): Difficulty =>
      runAction(() => {
        const difficulty = parseDifficulty(value);
        set({ difficulty });

        const current = get().session;
        if (current?.status === 'running' || current?.status === 'finished') {
          // Applies to the next session.
          return difficulty;
        }

        try {
          const sentence = sentenceBank.pick(difficulty);
          if (current) {
            install(sentence);
          } else {
            set({ sessionError: undefined });
          }
        } catch (error) {
          timer.cancel();
          set({ session: null, ...idleView(durationLimitSeconds) });
          throw error;
        }
        return difficulty;
      }),

    startTest: (): Session =>
      runAction(() => install(sentenceBank.pick(get().difficulty))),

    typeText: (typed: string): Session | null =>
      runAction(() => dispatch({ type: 'INPUT', typed, now: clock() })),

    tick: (): Session | null => runAction(() => dispatch({ type: 'TICK', now: clock() })),

    resetTest: (): Session | null =>
      runAction(() => {
        const current = get().session;
        if (!current) {
          return null;
        }
        if (current.status === 'finished') {
          throw new InvalidTransitionError('Acknowledge the results before resetting the test.');
        }
        if (current.status === 'ready') {
          return current;
        }
        console.info('[TypingSession] Session reset', `id=${current.id}`);
        return install(current.sentence);
      }),

    acknowledgeResults: (): Session =>
      runAction(() => {
        const current = get().session;
        if (current?.status !== 'finished') {
          throw new InvalidTransitionError('There are no results to acknowledge.');
        }
        const sentence = sentenceBank.pick(get().difficulty);
        set({ lastResult: undefined });
        return install(sentence);
      }),

    disposeTimer: (): void => {
      timer.cancel();
    },
  };
};
