/**
 * logsieve: synchronous log event filtering and dispatch.
 *
 * Events flow through observers: a Publisher fans out, a FilteringObserver
 * consults its predicates, and a SinkBridgeObserver hands what survives to
 * pino.
 */
export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
export { createLogPipeline } from './pipeline.js';
export type { LogPipeline, LogPipelineOptions } from './pipeline.js';
