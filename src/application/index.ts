export { FilteringObserver } from './filtering-observer.js';
export { Publisher } from './publisher.js';
export type { PublisherOptions } from './publisher.js';
export { NamespaceLevelFilter, ROOT_NAMESPACE } from './namespace-level-filter.js';
export type { NamespaceKey, NamespaceLevelFilterOptions } from './namespace-level-filter.js';
export { Logger } from './logger.js';
export type { LoggerOptions, EventFields } from './logger.js';
