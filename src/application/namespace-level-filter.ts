import type { LogEvent } from '../domain/event.js';
import { InvalidLogLevelError, LogLevel } from '../domain/log-level.js';
import type { LogPredicate, PredicateResult } from '../domain/predicate.js';

/**
 * Key for the root entry of the threshold table: the default for every
 * namespace without a more specific entry. Distinct from the empty string,
 * which is an ordinary namespace.
 */
export const ROOT_NAMESPACE: unique symbol = Symbol('logsieve.root-namespace');

export type NamespaceKey = string | typeof ROOT_NAMESPACE;

export interface NamespaceLevelFilterOptions {
  /** Threshold used when neither a namespace entry nor a root entry applies. */
  defaultLevel?: LogLevel;
}

/**
 * Predicate that vetoes events below a per-namespace severity threshold.
 *
 * Thresholds are looked up hierarchically over whole dot-separated
 * segments: with an entry for "a.b", the namespace "a.b.c.d" resolves to
 * it, while "a.bc" does not.
 *
 * Never answers `yes`: it only drops, leaving the accept decision to the
 * rest of the chain.
 */
export class NamespaceLevelFilter implements LogPredicate {
  /** Fallback threshold for instances constructed without one. */
  static readonly defaultLevel: LogLevel = LogLevel.info;

  readonly defaultLevel: LogLevel;
  private readonly thresholds: Map<NamespaceKey, LogLevel> = new Map();

  constructor(options: NamespaceLevelFilterOptions = {}) {
    const defaultLevel = options.defaultLevel ?? NamespaceLevelFilter.defaultLevel;
    if (!LogLevel.isLevel(defaultLevel)) {
      throw new InvalidLogLevelError(defaultLevel);
    }
    this.defaultLevel = defaultLevel;
  }

  /**
   * Set the threshold for a namespace, or for the root with ROOT_NAMESPACE.
   * Only genuine LogLevel constants are accepted; the table is left
   * unchanged otherwise.
   */
  setThreshold(namespace: NamespaceKey, level: LogLevel): void {
    if (!LogLevel.isLevel(level)) {
      throw new InvalidLogLevelError(level);
    }
    this.thresholds.set(namespace, level);
  }

  /** Resolve the effective threshold for a namespace. */
  thresholdFor(namespace: NamespaceKey): LogLevel {
    if (namespace !== ROOT_NAMESPACE) {
      const exact = this.thresholds.get(namespace);
      if (exact !== undefined) return exact;

      const segments = namespace.split('.');
      for (let end = segments.length - 1; end > 0; end--) {
        const prefix = segments.slice(0, end).join('.');
        const inherited = this.thresholds.get(prefix);
        if (inherited !== undefined) return inherited;
      }
    }

    return this.thresholds.get(ROOT_NAMESPACE) ?? this.defaultLevel;
  }

  /** Drop every entry, root included. */
  clear(): void {
    this.thresholds.clear();
  }

  evaluate(event: LogEvent): PredicateResult {
    const { namespace, level } = event;

    // Unclassified events are always rejected.
    if (typeof namespace !== 'string' || !LogLevel.isLevel(level)) {
      return 'no';
    }

    return level.isBelow(this.thresholdFor(namespace)) ? 'no' : 'maybe';
  }
}
