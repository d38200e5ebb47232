import { LIVE_WPM_WARMUP_SECONDS, SESSION_DURATION_SECONDS } from '@/config/typing.config';
import type { FinishReason, Sentence, Session } from '@/types';

import { classify, computeNetWpm, toCharacters } from './comparator';
import { summarize } from './results-reporter';

export type SessionAction =
  | { type: 'INPUT'; typed: string; now: number }
  | { type: 'TICK'; now: number };

export function createSession(
  sentence: Sentence,
  id: number,
  durationLimitSeconds: number = SESSION_DURATION_SECONDS,
): Session {
  return {
    id,
    sentence,
    status: 'ready',
    startedAt: null,
    durationLimitSeconds,
    typed: '',
    elapsedSeconds: 0,
  };
}

/**
 * Elapsed seconds as of `now`. Never decreases while running, never exceeds the
 * session limit, and stays frozen once the session is finished.
 */
export function getElapsedSeconds(session: Session, now: number): number {
  if (session.status !== 'running' || session.startedAt === null) {
    return session.elapsedSeconds;
  }
  const measured = (now - session.startedAt) / 1000;
  return Math.min(session.durationLimitSeconds, Math.max(session.elapsedSeconds, measured));
}

export function getRemainingSeconds(session: Session): number {
  return Math.max(0, session.durationLimitSeconds - session.elapsedSeconds);
}

export function getLiveWpm(session: Session): number {
  if (session.result) {
    return session.result.netWpm;
  }
  if (session.elapsedSeconds < LIVE_WPM_WARMUP_SECONDS) {
    return 0;
  }
  return computeNetWpm(toCharacters(session.typed).length, session.elapsedSeconds);
}

const finish = (session: Session, finishReason: FinishReason): Session => {
  const finished: Session = { ...session, status: 'finished', finishReason };
  return { ...finished, result: summarize(finished) };
};

const hasTimedOut = (session: Session): boolean =>
  session.elapsedSeconds >= session.durationLimitSeconds;

function applyInput(session: Session, typed: string, now: number): Session {
  switch (session.status) {
    case 'finished':
      return session;
    case 'ready': {
      if (typed.length === 0) {
        return session;
      }
      const started: Session = { ...session, status: 'running', startedAt: now, typed };
      return classify(typed, session.sentence.text).isComplete ? finish(started, 'completed') : started;
    }
    case 'running': {
      const elapsedSeconds = getElapsedSeconds(session, now);
      // Time ran out before this keystroke was delivered; the timeout wins.
      if (elapsedSeconds >= session.durationLimitSeconds) {
        return finish({ ...session, elapsedSeconds }, 'timeout');
      }
      const next: Session = { ...session, typed, elapsedSeconds };
      return classify(typed, session.sentence.text).isComplete ? finish(next, 'completed') : next;
    }
    default:
      return session;
  }
}

function applyTick(session: Session, now: number): Session {
  if (session.status !== 'running') {
    return session;
  }
  const next: Session = { ...session, elapsedSeconds: getElapsedSeconds(session, now) };
  return hasTimedOut(next) ? finish(next, 'timeout') : next;
}

export function sessionReducer(session: Session, action: SessionAction): Session {
  switch (action.type) {
    case 'INPUT':
      return applyInput(session, action.typed, action.now);
    case 'TICK':
      return applyTick(session, action.now);
    default:
      return session;
  }
}
