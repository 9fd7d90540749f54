import type { Logger as PinoLogger } from 'pino';
import type { LogPredicate } from './domain/index.js';
import { FilteringObserver, Logger, Publisher } from './application/index.js';
import type { NamespaceLevelFilter } from './application/index.js';
import { SinkBridgeObserver } from './infrastructure/bridge/index.js';
import type { SinkBridgeOptions } from './infrastructure/bridge/index.js';
import {
  createNamespaceLevelFilter,
  filterConfigFromEnv,
  loadFilterConfig,
} from './infrastructure/config/index.js';

export interface LogPipelineOptions {
  /** Path to the JSON threshold file. Defaults to config/log-filter.json. */
  configPath?: string;
  /** Environment read for LOG_FILTER_* overrides. */
  env?: NodeJS.ProcessEnv;
  /** Extra predicates evaluated after the namespace filter. */
  predicates?: readonly LogPredicate[];
  /** Options for the terminal bridge. stackDepth is computed unless given. */
  bridge?: SinkBridgeOptions;
  /** Diagnostics logger for the publisher. */
  log?: PinoLogger;
}

export interface LogPipeline {
  /** Entry point: deliver events here. */
  readonly publisher: Publisher;
  readonly filter: NamespaceLevelFilter;
  readonly bridge: SinkBridgeObserver;
  /** Logger bound to a namespace, delivering into the publisher. */
  logger(namespace: string): Logger;
}

/**
 * Wires the standard pipeline:
 *
 *   Logger → Publisher → FilteringObserver(namespace filter, ...predicates) → SinkBridgeObserver
 *
 * Order:
 * 1) Thresholds: config file, then environment overrides
 * 2) Terminal bridge
 * 3) Filter in front of the bridge
 * 4) Publisher as the entry point
 */
export function createLogPipeline(options: LogPipelineOptions = {}): LogPipeline {
  const config = filterConfigFromEnv(options.env ?? process.env, loadFilterConfig(options.configPath));
  const filter = createNamespaceLevelFilter(config);

  // Logger.emit → Publisher.deliver → FilteringObserver.deliver → bridge
  const stackDepth = SinkBridgeObserver.defaultStackDepth + 2 + Logger.emitDepth;
  const bridge = new SinkBridgeObserver({
    ...options.bridge,
    stackDepth: options.bridge?.stackDepth ?? stackDepth,
  });

  const filtering = new FilteringObserver(bridge, [filter, ...(options.predicates ?? [])]);
  const publisher = new Publisher([filtering], { log: options.log });

  return {
    publisher,
    filter,
    bridge,
    logger(namespace: string): Logger {
      return new Logger({ namespace, observer: publisher });
    },
  };
}
