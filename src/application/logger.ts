import type { LogEvent, LogObserver } from '../domain/event.js';
import { LogLevel } from '../domain/log-level.js';

export type EventFields = Record<string, unknown>;

export interface LoggerOptions {
  /** Namespace stamped on every event, e.g. "billing.invoices". */
  namespace: string;
  /** Where events go: usually a Publisher. */
  observer: LogObserver;
  /** Clock: injectable for tests. */
  nowFn?: () => number;
}

/**
 * Front end that turns log calls into events.
 *
 * Reserved keys (`level`, `namespace`, `format`, `time`) always win over
 * same-named entries in `fields`.
 */
export class Logger {
  /**
   * Frames a level method adds between the caller and the observer
   * (the level method itself plus emit). Add this to a bridge's
   * stackDepth to attribute records to the caller of `info()` etc.
   */
  static readonly emitDepth = 2;

  readonly namespace: string;
  private readonly observer: LogObserver;
  private readonly nowFn: () => number;

  constructor(options: LoggerOptions) {
    this.namespace = options.namespace;
    this.observer = options.observer;
    this.nowFn = options.nowFn ?? Date.now;
  }

  debug(format: string, fields?: EventFields): void {
    this.emit(LogLevel.debug, format, fields);
  }

  info(format: string, fields?: EventFields): void {
    this.emit(LogLevel.info, format, fields);
  }

  warn(format: string, fields?: EventFields): void {
    this.emit(LogLevel.warn, format, fields);
  }

  error(format: string, fields?: EventFields): void {
    this.emit(LogLevel.error, format, fields);
  }

  critical(format: string, fields?: EventFields): void {
    this.emit(LogLevel.critical, format, fields);
  }

  emit(level: LogLevel, format: string, fields: EventFields = {}): void {
    const event: LogEvent = {
      ...fields,
      format,
      level,
      namespace: this.namespace,
      time: this.nowFn(),
    };
    this.observer.deliver(event);
  }

  /** Logger for a nested namespace ("a.b" → "a.b.c"). */
  child(segment: string): Logger {
    return new Logger({
      namespace: this.namespace === '' ? segment : `${this.namespace}.${segment}`,
      observer: this.observer,
      nowFn: this.nowFn,
    });
  }
}
