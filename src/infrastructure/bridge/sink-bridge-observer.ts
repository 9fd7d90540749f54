import { pino } from 'pino';
import type { LogEvent, LogObserver } from '../../domain/event.js';
import type { EventFormatter } from '../../domain/format.js';
import { formatEvent } from '../../domain/format.js';
import type { LogLevelName } from '../../domain/log-level.js';
import { LogLevel } from '../../domain/log-level.js';
import type { CallerResolver } from './caller.js';
import { resolveStackCaller } from './caller.js';
import { EventText } from './event-text.js';
import type { ExternalSink } from './pino-sink.js';
import { createPinoSink } from './pino-sink.js';

/** LogLevel → sink severity (pino's numeric scale). */
export const SINK_SEVERITY: Readonly<Record<LogLevelName, number>> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  critical: 60,
};

/** Severity for events with a missing or unrecognised level. */
export const DEFAULT_SINK_SEVERITY = SINK_SEVERITY.info;

export function sinkSeverityFor(level: unknown): number {
  return LogLevel.isLevel(level) ? SINK_SEVERITY[level.name] : DEFAULT_SINK_SEVERITY;
}

export interface SinkBridgeOptions {
  /** Logger name used for the default pino sink. */
  name?: string;
  /** Frames between `deliver` and the call site to attribute. */
  stackDepth?: number;
  sink?: ExternalSink;
  resolveCaller?: CallerResolver;
  format?: EventFormatter;
}

/**
 * Terminal observer that hands accepted events to an external sink.
 *
 * Formatting is deferred to the sink (see EventText), and records are
 * attributed to the original call site rather than to a pipeline frame.
 *
 * Note: nothing here guards against a sink configured to block (a
 * synchronous network destination, say). Configure the sink so it does not.
 */
export class SinkBridgeObserver implements LogObserver {
  /**
   * Depth for a bridge called directly by the code being attributed.
   * Add one for every Publisher or FilteringObserver in front of it, and
   * Logger.emitDepth when events come from a Logger.
   */
  static readonly defaultStackDepth = 1;

  readonly name: string;
  readonly stackDepth: number;
  private readonly sink: ExternalSink;
  private readonly resolveCaller: CallerResolver;
  private readonly format: EventFormatter;

  constructor(options: SinkBridgeOptions = {}) {
    const stackDepth = options.stackDepth ?? SinkBridgeObserver.defaultStackDepth;
    if (!Number.isInteger(stackDepth) || stackDepth < 1) {
      throw new RangeError(`stackDepth must be a positive integer, got ${stackDepth}`);
    }

    this.name = options.name ?? 'logsieve';
    this.stackDepth = stackDepth;
    this.sink = options.sink ?? createPinoSink(pino({ name: this.name }));
    this.resolveCaller = options.resolveCaller ?? resolveStackCaller;
    this.format = options.format ?? formatEvent;
  }

  deliver(event: LogEvent): void {
    this.sink.log(
      sinkSeverityFor(event.level),
      new EventText(event, this.format),
      () => this.resolveCaller(this.stackDepth, this.deliver),
    );
  }
}
