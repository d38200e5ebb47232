import {
  createSession,
  getElapsedSeconds,
  getLiveWpm,
  getRemainingSeconds,
  sessionReducer,
} from '@/lib/typing';
import type { Sentence, Session } from '@/types';

const sentence: Sentence = { text: 'cat', difficulty: 'EASY' };

const input = (session: Session, typed: string, nowMs: number): Session =>
  sessionReducer(session, { type: 'INPUT', typed, now: nowMs });

const tick = (session: Session, nowMs: number): Session =>
  sessionReducer(session, { type: 'TICK', now: nowMs });

describe('createSession', () => {
  it('creates a ready session with no start time', () => {
    const session = createSession(sentence, 7);

    expect(session).toEqual({
      id: 7,
      sentence,
      status: 'ready',
      startedAt: null,
      durationLimitSeconds: 300,
      typed: '',
      elapsedSeconds: 0,
    });
  });
});

describe('sessionReducer', () => {
  it('ignores an empty input while ready', () => {
    const session = createSession(sentence, 1);

    expect(input(session, '', 5_000)).toBe(session);
  });

  it('starts running on the first character and records the start time once', () => {
    const ready = createSession(sentence, 1);

    const running = input(ready, 'c', 1_000);
    expect(running.status).toBe('running');
    expect(running.startedAt).toBe(1_000);
    expect(running.elapsedSeconds).toBe(0);

    const later = input(running, 'ca', 3_000);
    expect(later.startedAt).toBe(1_000);
    expect(later.elapsedSeconds).toBe(2);
    expect(later.typed).toBe('ca');
  });

  it('keeps running when the input is cleared again', () => {
    const running = input(createSession(sentence, 1), 'c', 0);

    const cleared = input(running, '', 2_000);

    expect(cleared.status).toBe('running');
    expect(cleared.typed).toBe('');
    expect(cleared.startedAt).toBe(0);
  });

  it('finishes on an exact match and summarizes the session', () => {
    let session = input(createSession(sentence, 1), 'c', 0);
    session = input(session, 'ca', 10_000);
    session = input(session, 'cat', 30_000);

    expect(session.status).toBe('finished');
    expect(session.finishReason).toBe('completed');
    expect(session.result?.durationSeconds).toBe(30);
    expect(session.result?.netWpm).toBeCloseTo(1.2, 10);
    expect(session.result?.characterErrors).toBe(0);
  });

  it('does not finish when the typed text only matches with trailing extras', () => {
    let session = input(createSession(sentence, 1), 'c', 0);
    session = input(session, 'cats', 4_000);

    expect(session.status).toBe('running');
  });

  it('finishes immediately when the first input already matches', () => {
    const session = input(createSession(sentence, 1), 'cat', 500);

    expect(session.status).toBe('finished');
    expect(session.result).toEqual({
      durationSeconds: 0,
      netWpm: 0,
      characterErrors: 0,
      typedLength: 3,
      correctCharacters: 3,
      finishReason: 'completed',
      difficulty: 'EASY',
      sentence: 'cat',
    });
  });

  it('times out on a tick at the limit without counting untyped characters', () => {
    let session = input(createSession(sentence, 1), 'c', 0);
    session = input(session, 'ca', 5_000);
    session = tick(session, 300_000);

    expect(session.status).toBe('finished');
    expect(session.finishReason).toBe('timeout');
    expect(session.result?.durationSeconds).toBe(300);
    expect(session.result?.characterErrors).toBe(0);
    expect(session.result?.typedLength).toBe(2);
  });

  it('caps the duration at the limit when the tick arrives late', () => {
    let session = input(createSession(sentence, 1), 'c', 0);
    session = tick(session, 301_500);

    expect(session.result?.durationSeconds).toBe(300);
  });

  it('lets the timeout win over a keystroke delivered after the limit', () => {
    let session = input(createSession(sentence, 1), 'ca', 0);
    session = input(session, 'cat', 305_000);

    expect(session.finishReason).toBe('timeout');
    expect(session.typed).toBe('ca');
    expect(session.result?.durationSeconds).toBe(300);
  });

  it('updates elapsed time on ticks before the limit', () => {
    let session = input(createSession(sentence, 1), 'c', 0);
    session = tick(session, 42_000);

    expect(session.status).toBe('running');
    expect(session.elapsedSeconds).toBe(42);
  });

  it('ignores ticks unless running', () => {
    const ready = createSession(sentence, 1);
    expect(tick(ready, 10_000)).toBe(ready);

    const finished = input(ready, 'cat', 0);
    expect(tick(finished, 999_000)).toBe(finished);
  });

  it('ignores input after the session finished', () => {
    const finished = input(createSession(sentence, 1), 'cat', 0);

    const after = input(finished, 'catx', 2_000);

    expect(after).toBe(finished);
    expect(after.result).toBe(finished.result);
  });

  it('never moves elapsed time backwards', () => {
    let session = input(createSession(sentence, 1), 'c', 10_000);
    session = input(session, 'ca', 20_000);
    session = tick(session, 15_000);

    expect(session.elapsedSeconds).toBe(10);
  });

  it('honours a custom duration limit', () => {
    let session = input(createSession(sentence, 1, 60), 'c', 0);
    session = tick(session, 60_000);

    expect(session.finishReason).toBe('timeout');
    expect(session.result?.durationSeconds).toBe(60);
  });
});

describe('getElapsedSeconds', () => {
  it('is zero before the first keystroke', () => {
    expect(getElapsedSeconds(createSession(sentence, 1), 50_000)).toBe(0);
  });

  it('is frozen once finished', () => {
    const finished = tick(input(createSession(sentence, 1), 'c', 0), 300_000);

    expect(getElapsedSeconds(finished, 900_000)).toBe(300);
  });
});

describe('getRemainingSeconds', () => {
  it('counts down from the limit', () => {
    const session = tick(input(createSession(sentence, 1), 'c', 0), 45_000);

    expect(getRemainingSeconds(session)).toBe(255);
  });
});

describe('getLiveWpm', () => {
  it('reports 0 during the first second', () => {
    const session = input(input(createSession(sentence, 1), 'c', 0), 'ca', 500);

    expect(getLiveWpm(session)).toBe(0);
  });

  it('uses typed length and elapsed time while running', () => {
    const session = input(input(createSession(sentence, 1), 'c', 0), 'ca', 30_000);

    expect(getLiveWpm(session)).toBeCloseTo(0.8, 10);
  });

  it('reports the final WPM once finished', () => {
    const session = input(input(createSession(sentence, 1), 'c', 0), 'cat', 30_000);

    expect(getLiveWpm(session)).toBeCloseTo(1.2, 10);
  });
});
