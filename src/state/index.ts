/**
 * State files shared with the CV process
 */

export {
  normalizeSessionFlag,
  serializeWorkoutId,
  writeWorkoutId,
} from './workout-id-writer';
export type { SessionFlag, WorkoutIdRecord } from './workout-id-writer';

export {
  RepLogEntrySchema,
  emptyRepCount,
  parseRepLogLine,
  readRepCount,
  summarizeRepLog,
} from './rep-log-reader';
export type { RepCountResult, RepLogEntry } from './rep-log-reader';

export { readLiveMetrics } from './live-metrics-reader';
export type { LiveMetrics } from './live-metrics-reader';
