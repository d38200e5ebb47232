export type { SentenceRepository } from './sentence.repository';
export { FileSentenceRepository } from './sentence.repository';
