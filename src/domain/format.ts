import type { LogEvent } from './event.js';

/** Renders an event to text. */
export type EventFormatter = (event: LogEvent) => string;

const PLACEHOLDER = /\{\{|\}\}|\{([^{}]*)\}|[{}]/g;

/**
 * Render an event's `format` template.
 *
 * `{name}` is replaced with `String(event[name])`; `{{` and `}}` are
 * literal braces. Events without a format render as the empty string.
 * Never throws: a broken template renders as an explanation instead.
 */
export function formatEvent(event: LogEvent): string {
  const format = event.format;
  if (format === undefined || format === null) return '';

  try {
    return format.replace(PLACEHOLDER, (token: string, key: string | undefined) => {
      if (token === '{{') return '{';
      if (token === '}}') return '}';
      if (key === undefined) {
        throw new Error(`Unbalanced brace in format: ${JSON.stringify(format)}`);
      }
      if (!Object.hasOwn(event, key)) {
        throw new Error(`Missing key ${JSON.stringify(key)}`);
      }
      return String(event[key]);
    });
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    return `Unable to format event ${describeEvent(event)}: ${reason}`;
  }
}

function describeEvent(event: LogEvent): string {
  const plain: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(event)) {
    // Hops hold observer references; the count is enough here.
    plain[key] = key === 'trace' && Array.isArray(value) ? `[${value.length} hops]` : value;
  }
  try {
    return JSON.stringify(plain);
  } catch {
    return Object.keys(plain).join(', ');
  }
}
