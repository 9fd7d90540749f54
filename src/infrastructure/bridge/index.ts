export {
  SinkBridgeObserver,
  SINK_SEVERITY,
  DEFAULT_SINK_SEVERITY,
  sinkSeverityFor,
} from './sink-bridge-observer.js';
export type { SinkBridgeOptions } from './sink-bridge-observer.js';
export { EventText } from './event-text.js';
export { createPinoSink } from './pino-sink.js';
export type { ExternalSink, Stringifiable } from './pino-sink.js';
export { resolveStackCaller, parseStackFrame } from './caller.js';
export type { CallerFrame, CallerResolver } from './caller.js';
