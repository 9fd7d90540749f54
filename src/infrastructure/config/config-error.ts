import type { ZodIssue } from 'zod';

/**
 * Raised when configuration content is present but unusable.
 * A missing file is not an error: callers fall back to defaults.
 */
export class ConfigError extends Error {
  readonly code = 'INVALID_CONFIG';
  readonly source: string;
  readonly issues: readonly ZodIssue[];

  constructor(source: string, message: string, issues: readonly ZodIssue[] = []) {
    super(`${source}: ${message}`);
    this.name = 'ConfigError';
    this.source = source;
    this.issues = issues;
  }
}

/** Flatten zod issues into "path: message" lines. */
export function describeIssues(issues: readonly ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
