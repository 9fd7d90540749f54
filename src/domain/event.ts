/**
 * Core domain types for the log event model.
 *
 * An event is an open key/value record. The pipeline only reads a handful
 * of reserved keys and never changes anything but the trace.
 */
import type { LogLevel } from './log-level.js';

/**
 * Anything that consumes events. Publishers, filters and sink bridges are
 * all observers, so they can be nested freely.
 */
export interface LogObserver {
  deliver(event: LogEvent): void;
}

/** One forwarding hop: [source, destination]. */
export type TraceHop = readonly [source: LogObserver, destination: LogObserver];

/**
 * A single structured log record.
 *
 * Reserved keys:
 * - `level`: severity, or absent/null when unclassified
 * - `namespace`: dot-segmented origin, or absent/null
 * - `trace`: opt-in hop log; appended to in place as the event travels
 * - `format`: template rendered by formatEvent()
 * - `time`: epoch milliseconds, set by Logger
 */
export interface LogEvent {
  readonly [key: string]: unknown;
  readonly level?: LogLevel | null;
  readonly namespace?: string | null;
  readonly trace?: TraceHop[];
  readonly format?: string | null;
  readonly time?: number;
}

/** Append a hop if the event opted into tracing. */
export function recordHop(event: LogEvent, source: LogObserver, destination: LogObserver): void {
  event.trace?.push([source, destination]);
}

/** Adapt a plain function into a LogObserver. */
export function createObserver(fn: (event: LogEvent) => void): LogObserver {
  return {
    deliver(event: LogEvent): void {
      fn(event);
    },
  };
}
