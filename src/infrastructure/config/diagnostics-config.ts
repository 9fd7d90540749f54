import { z } from 'zod';
import { ConfigError, describeIssues } from './config-error.js';

/** pino levels accepted for the pipeline's own diagnostics. */
const diagnosticsLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const diagnosticsEnvSchema = z.object({
  LOG_LEVEL: diagnosticsLevelSchema.default('warn'),
});

export type DiagnosticsLevel = z.infer<typeof diagnosticsLevelSchema>;

export interface DiagnosticsConfig {
  level: DiagnosticsLevel;
}

/** Reads `LOG_LEVEL` (default "warn"). */
export function loadDiagnosticsConfig(env: NodeJS.ProcessEnv = process.env): DiagnosticsConfig {
  const parsed = diagnosticsEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError('environment', describeIssues(parsed.error.issues), parsed.error.issues);
  }
  return { level: parsed.data.LOG_LEVEL };
}
