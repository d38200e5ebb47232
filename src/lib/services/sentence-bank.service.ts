import { LoadError } from '@/lib/errors';
import { parseDifficulty } from '@/lib/validators';
import { DIFFICULTIES, type Difficulty, type RandomSource, type Sentence, type SentenceCorpus } from '@/types';

export class SentenceBank {
  constructor(
    private readonly corpus: SentenceCorpus,
    private readonly random: RandomSource = Math.random,
  ) {}

  /** Tiers that have at least one sentence to draw from. */
  tiers(): Difficulty[] {
    return DIFFICULTIES.filter((difficulty) => this.corpus[difficulty].length > 0);
  }

  /**
   * Draws one sentence uniformly from the requested tier. The difficulty is
   * validated here since it may come straight from a form control.
   */
  pick(difficulty: unknown): Sentence {
    const tier = parseDifficulty(difficulty);
    const candidates = this.corpus[tier];
    if (candidates.length === 0) {
      throw new LoadError(`No sentences available for ${tier} difficulty.`);
    }

    const index = Math.min(candidates.length - 1, Math.floor(this.random() * candidates.length));
    return { text: candidates[Math.max(0, index)], difficulty: tier };
  }
}
