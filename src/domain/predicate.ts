import { z } from 'zod';
import type { LogEvent } from './event.js';

/**
 * Tri-state decision returned by a predicate.
 *
 * - `yes` forces the event through and stops evaluation
 * - `no` drops the event and stops evaluation
 * - `maybe` abstains; an all-maybe chain forwards
 */
export const predicateResultSchema = z.enum(['yes', 'no', 'maybe']);

export type PredicateResult = z.infer<typeof predicateResultSchema>;

export const PredicateResult = {
  yes: 'yes',
  no: 'no',
  maybe: 'maybe',
} as const satisfies Record<PredicateResult, PredicateResult>;

/**
 * A predicate is a pure decision function over one event.
 * It must not mutate the event.
 */
export interface LogPredicate {
  evaluate(event: LogEvent): PredicateResult;
}

/** Thrown when a predicate returns anything other than yes/no/maybe. */
export class PredicateResultError extends TypeError {
  readonly code = 'INVALID_PREDICATE_RESULT';
  readonly result: unknown;

  constructor(result: unknown) {
    super(`Invalid predicate result: ${String(result)}`);
    this.name = 'PredicateResultError';
    this.result = result;
  }
}

/**
 * Validate a value returned by a predicate.
 * Predicates written in plain JavaScript can return anything.
 */
export function checkPredicateResult(result: unknown): PredicateResult {
  const parsed = predicateResultSchema.safeParse(result);
  if (!parsed.success) {
    throw new PredicateResultError(result);
  }
  return parsed.data;
}

/** Adapt a plain function into a LogPredicate. */
export function createPredicate(fn: (event: LogEvent) => PredicateResult): LogPredicate {
  return {
    evaluate(event: LogEvent): PredicateResult {
      return fn(event);
    },
  };
}
