import type { KeyEvent } from './types';

export interface EventQueue {
  /** Enqueue without blocking. Returns false (and counts a drop) when full. */
  offer(event: KeyEvent): boolean;
  /** Hand every queued event to `fn` in enqueue order. Returns the count drained. */
  drain(fn: (event: KeyEvent) => void): number;
  /** Discard queued events. The drop counter is kept. */
  clear(): void;
  /** Events currently queued. */
  readonly length: number;
  /** Events rejected because the queue was full. */
  readonly dropped: number;
  readonly capacity: number;
}

/**
 * Fixed-capacity FIFO between the capture side and the tick loop.
 * Overflow drops the newest event so capture never waits on the consumer.
 */
export function createEventQueue(capacity: number): EventQueue {
  const slots: (KeyEvent | undefined)[] = new Array(capacity);
  let head = 0;
  let count = 0;
  let dropped = 0;

  return {
    offer(event: KeyEvent) {
      if (count === capacity) {
        dropped++;
        return false;
      }
      slots[(head + count) % capacity] = event;
      count++;
      return true;
    },

    drain(fn: (event: KeyEvent) => void) {
      let drained = 0;
      // Events offered from inside fn land behind the current batch and are drained too.
      while (count > 0) {
        const event = slots[head];
        slots[head] = undefined;
        head = (head + 1) % capacity;
        count--;
        if (event) {
          drained++;
          fn(event);
        }
      }
      return drained;
    },

    clear() {
      slots.fill(undefined);
      head = 0;
      count = 0;
    },

    get length() {
      return count;
    },

    get dropped() {
      return dropped;
    },

    get capacity() {
      return capacity;
    },
  };
}
