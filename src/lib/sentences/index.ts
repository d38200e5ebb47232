export {
  countSentences,
  createEmptyCorpus,
  describeCorpus,
  parseSentenceCorpus,
} from './sentence-parser';
