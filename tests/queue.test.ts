import { describe, it, expect } from 'vitest';
import { createEventQueue } from '../src/queue';
import type { KeyEvent } from '../src/types';
import { press, release } from './fixtures/events';

function drainAll(queue: ReturnType<typeof createEventQueue>): KeyEvent[] {
  const out: KeyEvent[] = [];
  queue.drain((event) => { out.push(event); });
  return out;
}

describe('createEventQueue', () => {
  it('drains events in enqueue order', () => {
    const queue = createEventQueue(4);
    queue.offer(press('a', 1));
    queue.offer(press('s', 2));
    queue.offer(release('a', 3));

    expect(queue.length).toBe(3);
    expect(drainAll(queue).map((e) => e.timestamp)).toEqual([1, 2, 3]);
    expect(queue.length).toBe(0);
  });

  it('drops the newest event when full', () => {
    const queue = createEventQueue(2);
    expect(queue.offer(press('a', 1))).toBe(true);
    expect(queue.offer(press('s', 2))).toBe(true);
    expect(queue.offer(press('d', 3))).toBe(false);

    expect(queue.dropped).toBe(1);
    expect(drainAll(queue).map((e) => e.key)).toEqual(['a', 's']);
  });

  it('wraps around the ring', () => {
    const queue = createEventQueue(3);
    queue.offer(press('a', 1));
    queue.offer(press('s', 2));
    drainAll(queue);
    queue.offer(press('d', 3));
    queue.offer(press('f', 4));
    queue.offer(press('g', 5));

    expect(drainAll(queue).map((e) => e.key)).toEqual(['d', 'f', 'g']);
  });

  it('drains events offered during the drain', () => {
    const queue = createEventQueue(4);
    queue.offer(press('a', 1));
    const seen: string[] = [];
    const count = queue.drain((event) => {
      seen.push(event.key);
      if (event.key === 'a') queue.offer(release('a', 2));
    });

    expect(count).toBe(2);
    expect(seen).toEqual(['a', 'a']);
  });

  it('clear discards events but keeps the drop count', () => {
    const queue = createEventQueue(1);
    queue.offer(press('a', 1));
    queue.offer(press('s', 2));
    queue.clear();

    expect(queue.length).toBe(0);
    expect(queue.dropped).toBe(1);
    expect(drainAll(queue)).toEqual([]);
  });

  it('exposes its capacity', () => {
    expect(createEventQueue(7).capacity).toBe(7);
  });
});
