import { pino } from 'pino';
import type { Logger } from 'pino';
import type { DiagnosticsConfig } from './config/diagnostics-config.js';
import { loadDiagnosticsConfig } from './config/diagnostics-config.js';

let shared: Logger | null = null;

/** Logger for failures inside the pipeline itself (not for bridged events). */
export function createDiagnosticsLogger(config: DiagnosticsConfig = loadDiagnosticsConfig()): Logger {
  return pino({ name: 'logsieve', level: config.level });
}

/** Shared diagnostics logger, created on first use. */
export function diagnostics(): Logger {
  if (shared === null) {
    shared = createDiagnosticsLogger();
  }
  return shared;
}
