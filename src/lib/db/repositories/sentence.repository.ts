import { readFile } from 'node:fs/promises';

import { LoadError } from '@/lib/errors';
import { describeCorpus, parseSentenceCorpus } from '@/lib/sentences';
import type { SentenceCorpus } from '@/types';

export interface SentenceRepository {
  load(): Promise<SentenceCorpus>;
}

// fs errors may come from another realm, so match on shape.
const isMissingFileError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

export class FileSentenceRepository implements SentenceRepository {
  constructor(private readonly filePath: string) {}

  async load(): Promise<SentenceCorpus> {
    let source: string;
    try {
      source = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      const reason = isMissingFileError(error) ? 'not found' : 'could not be read';
      throw new LoadError(`Sentence file ${this.filePath} ${reason}.`, { cause: error });
    }

    const corpus = parseSentenceCorpus(source);
    console.info('[SentenceBank] Loaded sentences', describeCorpus(corpus));
    return corpus;
  }
}
