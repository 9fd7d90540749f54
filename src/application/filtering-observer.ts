import type { LogEvent, LogObserver } from '../domain/event.js';
import { recordHop } from '../domain/event.js';
import type { LogPredicate } from '../domain/predicate.js';
import { checkPredicateResult } from '../domain/predicate.js';

/**
 * Observer decorator that consults an ordered chain of predicates before
 * forwarding to its target.
 *
 * Evaluation short-circuits:
 * 1. `no` drops the event: later predicates never run.
 * 2. `yes` forwards the event: later predicates never run.
 * 3. `maybe` moves on to the next predicate.
 * 4. Running out of predicates forwards (maybe is default-accept).
 *
 * A predicate returning anything else throws PredicateResultError before
 * the target can be reached.
 */
export class FilteringObserver implements LogObserver {
  readonly target: LogObserver;
  private readonly predicates: readonly LogPredicate[];

  constructor(target: LogObserver, predicates: Iterable<LogPredicate> = []) {
    this.target = target;
    // Materialise once so generators are not exhausted after the first event.
    this.predicates = [...predicates];
  }

  /** Run the predicate chain without delivering. */
  shouldForward(event: LogEvent): boolean {
    for (const predicate of this.predicates) {
      const result = checkPredicateResult(predicate.evaluate(event));
      if (result === 'no') return false;
      if (result === 'yes') return true;
    }
    return true;
  }

  deliver(event: LogEvent): void {
    if (!this.shouldForward(event)) return;

    recordHop(event, this, this.target);
    this.target.deliver(event);
  }
}
