export { ConfigError } from './config-error.js';
export {
  filterConfigSchema,
  DEFAULT_FILTER_CONFIG,
  parseFilterConfig,
  loadFilterConfig,
  filterConfigFromEnv,
  createNamespaceLevelFilter,
} from './filter-config.js';
export type { FilterConfig } from './filter-config.js';
export { loadDiagnosticsConfig } from './diagnostics-config.js';
export type { DiagnosticsConfig, DiagnosticsLevel } from './diagnostics-config.js';
