import type { KeyEvent } from './types';

export interface EventWindow {
  /** Append an event and drop everything older than `span` before it. */
  push(event: KeyEvent): void;
  /** Copy of the events in arrival order. */
  toArray(): KeyEvent[];
  /** Events with timestamp >= `start`. */
  since(start: number): KeyEvent[];
  clear(): void;
  /** Trailing span in seconds, measured from the newest event. */
  span: number;
  readonly length: number;
}

/** Trailing window of live events, the input of every analysis tick. */
export function createEventWindow(span: number): EventWindow {
  let events: KeyEvent[] = [];
  let windowSpan = span;

  function prune() {
    if (events.length === 0) return;
    const cutoff = events[events.length - 1].timestamp - windowSpan;
    let first = 0;
    while (first < events.length && events[first].timestamp < cutoff) first++;
    if (first > 0) events = events.slice(first);
  }

  return {
    push(event: KeyEvent) {
      events.push(event);
      prune();
    },

    toArray() {
      return events.slice();
    },

    since(start: number) {
      return events.filter((e) => e.timestamp >= start);
    },

    clear() {
      events = [];
    },

    get span() {
      return windowSpan;
    },

    set span(value: number) {
      windowSpan = value;
      prune();
    },

    get length() {
      return events.length;
    },
  };
}
