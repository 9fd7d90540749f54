export * from './bridge/index.js';
export * from './config/index.js';
export { createDiagnosticsLogger, diagnostics } from './diagnostics.js';
