import { CHARACTERS_PER_WORD } from '@/config/typing.config';
import type { CharacterClassification } from '@/types';

export interface Comparison {
  readonly classifications: readonly CharacterClassification[];
  /** True only when the typed text equals the target exactly. */
  readonly isComplete: boolean;
}

export interface ClassificationCounts {
  readonly correct: number;
  readonly incorrect: number;
  readonly extra: number;
}

// Code points, so a surrogate pair counts as one typed character.
export const toCharacters = (text: string): string[] => Array.from(text);

export function classify(typed: string, target: string): Comparison {
  const typedChars = toCharacters(typed);
  const targetChars = toCharacters(target);

  const classifications = typedChars.map<CharacterClassification>((char, index) => {
    if (index >= targetChars.length) return 'extra';
    return char === targetChars[index] ? 'correct' : 'incorrect';
  });

  const isComplete =
    typedChars.length === targetChars.length &&
    classifications.every((classification) => classification === 'correct');

  return { classifications, isComplete };
}

export function countClassifications(
  classifications: readonly CharacterClassification[],
): ClassificationCounts {
  let correct = 0;
  let incorrect = 0;
  let extra = 0;
  classifications.forEach((classification) => {
    if (classification === 'correct') correct += 1;
    else if (classification === 'incorrect') incorrect += 1;
    else extra += 1;
  });
  return { correct, incorrect, extra };
}

export function countCharacterErrors(classifications: readonly CharacterClassification[]): number {
  const { incorrect, extra } = countClassifications(classifications);
  return incorrect + extra;
}

/**
 * Net words per minute using the 5-characters-per-word convention. This is a
 * character-count proxy, not a whitespace word count.
 */
export function computeNetWpm(typedLength: number, elapsedSeconds: number): number {
  if (!Number.isFinite(typedLength) || !Number.isFinite(elapsedSeconds)) return 0;
  if (typedLength <= 0 || elapsedSeconds <= 0) return 0;
  const minutes = elapsedSeconds / 60;
  return typedLength / CHARACTERS_PER_WORD / minutes;
}
