import { describe, it, expect } from 'vitest';
import { createEventWindow } from '../src/window';
import { press, release } from './fixtures/events';

describe('createEventWindow', () => {
  it('keeps events within span of the newest one', () => {
    const window = createEventWindow(1);
    window.push(press('a', 0));
    window.push(release('a', 0.5));
    window.push(press('s', 1.25));

    expect(window.toArray().map((e) => e.timestamp)).toEqual([0.5, 1.25]);
    expect(window.length).toBe(2);
  });

  it('keeps an event exactly span before the newest', () => {
    const window = createEventWindow(1);
    window.push(press('a', 0.5));
    window.push(press('s', 1.5));
    expect(window.length).toBe(2);
  });

  it('returns a copy', () => {
    const window = createEventWindow(10);
    window.push(press('a', 0));
    window.toArray().push(press('s', 1));
    expect(window.length).toBe(1);
  });

  it('filters events since a time', () => {
    const window = createEventWindow(10);
    window.push(press('a', 1));
    window.push(press('s', 2));
    window.push(press('d', 3));
    expect(window.since(2).map((e) => e.key)).toEqual(['s', 'd']);
  });

  it('prunes when the span shrinks', () => {
    const window = createEventWindow(10);
    window.push(press('a', 1));
    window.push(press('s', 5));
    window.push(press('d', 6));

    window.span = 2;
    expect(window.span).toBe(2);
    expect(window.toArray().map((e) => e.key)).toEqual(['s', 'd']);
  });

  it('clears', () => {
    const window = createEventWindow(10);
    window.push(press('a', 1));
    window.clear();
    expect(window.toArray()).toEqual([]);
  });
});
