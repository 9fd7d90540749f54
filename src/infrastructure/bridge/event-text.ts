import type { LogEvent } from '../../domain/event.js';
import type { EventFormatter } from '../../domain/format.js';
import { formatEvent } from '../../domain/format.js';

/**
 * Deferred rendering of an event.
 *
 * Nothing is formatted until the sink asks for text; the result is then
 * cached, so the formatter runs at most once.
 */
export class EventText {
  readonly event: LogEvent;
  private readonly format: EventFormatter;
  private rendered: string | undefined;

  constructor(event: LogEvent, format: EventFormatter = formatEvent) {
    this.event = event;
    this.format = format;
  }

  toString(): string {
    if (this.rendered === undefined) {
      this.rendered = this.format(this.event);
    }
    return this.rendered;
  }

  toJSON(): string {
    return this.toString();
  }
}
