import type { Logger } from 'pino';
import type { LogEvent, LogObserver } from '../domain/event.js';
import { recordHop } from '../domain/event.js';
import { diagnostics } from '../infrastructure/diagnostics.js';

export interface PublisherOptions {
  /** Receives observer failures. Defaults to the shared diagnostics logger. */
  log?: Logger;
}

/**
 * Fans one event out to every registered observer, in registration order.
 *
 * Each observer is invoked independently: a failure in one observer does
 * not prevent the others from receiving the event. Failures are logged
 * and never rethrown.
 */
export class Publisher implements LogObserver {
  private readonly registered: LogObserver[];
  private readonly log: Logger;

  constructor(observers: Iterable<LogObserver> = [], options: PublisherOptions = {}) {
    // Kept as given: an observer listed twice is delivered to twice.
    this.registered = [...observers];
    this.log = options.log ?? diagnostics();
  }

  /** Current observers, in delivery order. */
  get observers(): readonly LogObserver[] {
    return this.registered;
  }

  /** Register an observer. Adding one that is already registered is a no-op. */
  addObserver(observer: LogObserver): void {
    if (!this.registered.includes(observer)) {
      this.registered.push(observer);
    }
  }

  /** Unregister an observer. Unknown observers are ignored. */
  removeObserver(observer: LogObserver): void {
    const index = this.registered.indexOf(observer);
    if (index !== -1) {
      this.registered.splice(index, 1);
    }
  }

  deliver(event: LogEvent): void {
    // Snapshot so observers may (un)register during delivery.
    const observers = [...this.registered];

    for (const [observerIndex, observer] of observers.entries()) {
      recordHop(event, this, observer);
      try {
        observer.deliver(event);
      } catch (err: unknown) {
        this.log.error(
          { err, observerIndex, namespace: event.namespace ?? null },
          'Log observer failed, continuing with remaining observers',
        );
      }
    }
  }
}
