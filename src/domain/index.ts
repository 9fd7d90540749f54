export type { LogEvent, LogObserver, TraceHop } from './event.js';
export { createObserver, recordHop } from './event.js';
export type { LogLevelName } from './log-level.js';
export { LogLevel, InvalidLogLevelError } from './log-level.js';
export type { LogPredicate } from './predicate.js';
export {
  PredicateResult,
  PredicateResultError,
  predicateResultSchema,
  checkPredicateResult,
  createPredicate,
} from './predicate.js';
export type { EventFormatter } from './format.js';
export { formatEvent } from './format.js';
