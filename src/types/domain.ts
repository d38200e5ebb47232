/** Difficulty tiers, in the order they are offered to the user. */
export const DIFFICULTIES = ['EASY', 'MEDIUM', 'HARD'] as const;

/** One of the three sentence tiers. */
export type Difficulty = (typeof DIFFICULTIES)[number];

/**
 * A target sentence together with the tier it was drawn from.
 */
export interface Sentence {
  readonly text: string;
  readonly difficulty: Difficulty;
}

/** Parsed sentence resource, grouped by tier. */
export type SentenceCorpus = Readonly<Record<Difficulty, readonly string[]>>;

/** Source of uniformly distributed numbers in [0, 1). */
export type RandomSource = () => number;

/** Millisecond clock used to timestamp keystrokes and ticks. */
export type Clock = () => number;

/** Lifecycle of a single typing attempt. */
export type SessionStatus = 'ready' | 'running' | 'finished';

/** Why a session reached the finished state. */
export type FinishReason = 'completed' | 'timeout';

/** Per-position comparison of the typed text against the target. */
export type CharacterClassification = 'correct' | 'incorrect' | 'extra';

/**
 * Summary of a finished session, shown once in the results dialog.
 */
export interface TypingResult {
  /** Seconds between the first keystroke and the finish, capped at the session limit. */
  readonly durationSeconds: number;
  readonly netWpm: number;
  /** Incorrect plus extra characters at finish time. Untyped characters are not counted. */
  readonly characterErrors: number;
  readonly typedLength: number;
  readonly correctCharacters: number;
  readonly finishReason: FinishReason;
  readonly difficulty: Difficulty;
  readonly sentence: string;
}

/**
 * One timed typing attempt. Sessions are immutable values; every transition
 * produces a new object.
 */
export interface Session {
  readonly id: number;
  readonly sentence: Sentence;
  readonly status: SessionStatus;
  /** Clock reading of the first keystroke, `null` until then. */
  readonly startedAt: number | null;
  readonly durationLimitSeconds: number;
  readonly typed: string;
  readonly elapsedSeconds: number;
  readonly finishReason?: FinishReason;
  readonly result?: TypingResult;
}
