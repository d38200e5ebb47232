export { DIFFICULTIES } from './domain';
export type {
  CharacterClassification,
  Clock,
  Difficulty,
  FinishReason,
  RandomSource,
  Sentence,
  SentenceCorpus,
  Session,
  SessionStatus,
  TypingResult,
} from './domain';
export type { ThemeName, ThemePalette, TypingPreferences } from './ui';
