export { SentenceBank } from './sentence-bank.service';
