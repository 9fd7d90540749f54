import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { LogEvent, LogObserver, PredicateResult } from '../src/domain/index.js';
import { createObserver, createPredicate } from '../src/domain/index.js';

/** Observer that remembers everything delivered to it. */
export function collectingObserver(): LogObserver & { readonly seen: LogEvent[] } {
  const seen: LogEvent[] = [];
  return {
    seen,
    deliver(event: LogEvent): void {
      seen.push(event);
    },
  };
}

/** Observer that does nothing (useful as a trace destination). */
export function nullObserver(): LogObserver {
  return createObserver(() => undefined);
}

/** Predicate answering the same result for every event. */
export function constantPredicate(result: PredicateResult) {
  return createPredicate(() => result);
}

/** Reads the numeric `count` field test events carry. */
export function countOf(event: LogEvent): number {
  const count = event['count'];
  if (typeof count !== 'number') throw new Error('event has no count');
  return count;
}

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

/** pino destination that keeps each written line as parsed JSON. */
export function memoryDestination() {
  const records: Record<string, unknown>[] = [];
  return {
    records,
    write(line: string): void {
      records.push(JSON.parse(line) as Record<string, unknown>);
    },
  };
}
