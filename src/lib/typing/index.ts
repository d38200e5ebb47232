export {
  classify,
  computeNetWpm,
  countCharacterErrors,
  countClassifications,
  toCharacters,
} from './comparator';
export type { ClassificationCounts, Comparison } from './comparator';
export { createRepeatingTimer, defaultScheduler } from './repeating-timer';
export type { CancelTimer, RepeatingTimer, TimerScheduler } from './repeating-timer';
export { formatClock, formatResultSummary, summarize } from './results-reporter';
export {
  createSession,
  getElapsedSeconds,
  getLiveWpm,
  getRemainingSeconds,
  sessionReducer,
} from './session-machine';
export type { SessionAction } from './session-machine';
