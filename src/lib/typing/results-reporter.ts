import { InvalidTransitionError } from '@/lib/errors';
import type { Session, TypingResult } from '@/types';

import { classify, computeNetWpm, countClassifications, toCharacters } from './comparator';

/**
 * Builds the result for a session whose typed text and elapsed time are final.
 * The session machine calls this once, on the transition to finished.
 */
export function summarize(session: Session): TypingResult {
  const { finishReason } = session;
  if (session.status !== 'finished' || finishReason === undefined) {
    throw new InvalidTransitionError('Only a finished session can be summarized.');
  }

  const { classifications } = classify(session.typed, session.sentence.text);
  const counts = countClassifications(classifications);
  const typedLength = toCharacters(session.typed).length;

  return {
    durationSeconds: session.elapsedSeconds,
    netWpm: computeNetWpm(typedLength, session.elapsedSeconds),
    characterErrors: counts.incorrect + counts.extra,
    typedLength,
    correctCharacters: counts.correct,
    finishReason,
    difficulty: session.sentence.difficulty,
    sentence: session.sentence.text,
  };
}

export function formatClock(totalSeconds: number): string {
  const safe = Number.isFinite(totalSeconds) ? Math.max(0, Math.floor(totalSeconds)) : 0;
  const minutes = Math.floor(safe / 60);
  const seconds = safe % 60;
  return `${minutes}:${seconds.toString().padStart(2, '0')}`;
}

export function formatResultSummary(result: TypingResult): string[] {
  return [
    `Final WPM: ${Math.round(result.netWpm)}`,
    `Character Errors: ${result.characterErrors}`,
    `Time: ${formatClock(result.durationSeconds)}`,
  ];
}
