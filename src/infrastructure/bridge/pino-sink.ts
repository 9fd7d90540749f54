import type { Level, Logger } from 'pino';
import type { CallerFrame } from './caller.js';

/** Anything that can produce its text on demand. */
export interface Stringifiable {
  toString(): string;
}

/**
 * Port to the logging library events are bridged into.
 *
 * `severity` is on the sink's numeric scale. `findCaller` must be called
 * synchronously, if at all, because it inspects the live stack.
 */
export interface ExternalSink {
  log(severity: number, message: Stringifiable, findCaller: () => CallerFrame | undefined): void;
}

/** pino's numeric levels. */
const PINO_LABELS: ReadonlyMap<number, Level> = new Map<number, Level>([
  [10, 'trace'],
  [20, 'debug'],
  [30, 'info'],
  [40, 'warn'],
  [50, 'error'],
  [60, 'fatal'],
]);

/**
 * Sink writing to a pino logger.
 *
 * pino's own level gate runs first: records it would discard are never
 * stringified and never get a caller lookup.
 */
export function createPinoSink(logger: Logger): ExternalSink {
  return {
    log(severity: number, message: Stringifiable, findCaller: () => CallerFrame | undefined): void {
      const label = PINO_LABELS.get(severity) ?? 'info';
      if (!logger.isLevelEnabled(label)) return;

      const caller = findCaller();
      logger[label](caller === undefined ? {} : { caller }, message.toString());
    },
  };
}
