import { InvalidDifficultyError, LoadError } from '@/lib/errors';
import { parseDifficulty } from '@/lib/validators';
import { DIFFICULTIES, type Difficulty, type SentenceCorpus } from '@/types';

const HEADER_PATTERN = /^\[(.*)\]$/;

export const createEmptyCorpus = (): Record<Difficulty, string[]> => ({
  EASY: [],
  MEDIUM: [],
  HARD: [],
});

const parseHeader = (label: string, lineNumber: number): Difficulty => {
  try {
    return parseDifficulty(label);
  } catch (error) {
    if (error instanceof InvalidDifficultyError) {
      throw new LoadError(`Unknown difficulty tier "[${label}]" on line ${lineNumber}.`, {
        cause: error,
      });
    }
    throw error;
  }
};

/**
 * Parses the tiered sentence format:
 *
 * ```
 * [Easy]
 * The cat sat on the mat.
 * [Hard]
 * ...
 * ```
 *
 * Blank lines are skipped and every line is trimmed.
 */
export function parseSentenceCorpus(source: string): SentenceCorpus {
  const corpus = createEmptyCorpus();
  let current: Difficulty | null = null;

  source.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line.length === 0) {
      return;
    }

    const header = HEADER_PATTERN.exec(line);
    if (header) {
      current = parseHeader(header[1].trim(), index + 1);
      return;
    }

    if (current === null) {
      throw new LoadError(`Sentence on line ${index + 1} appears before any difficulty tier.`);
    }
    corpus[current].push(line);
  });

  if (countSentences(corpus) === 0) {
    throw new LoadError('Sentence resource contains no sentences.');
  }

  return corpus;
}

export function countSentences(corpus: SentenceCorpus): number {
  return DIFFICULTIES.reduce((total, difficulty) => total + corpus[difficulty].length, 0);
}

export function describeCorpus(corpus: SentenceCorpus): string {
  return DIFFICULTIES.map((difficulty) => `${difficulty}=${corpus[difficulty].length}`).join(' ');
}
