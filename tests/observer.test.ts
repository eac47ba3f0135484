import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createObserver } from '../src/observer';
import type { KeyEvent } from '../src/types';

// Minimal EventTarget mock that tracks listener options
class MockTarget extends EventTarget {
  public addedListeners: { type: string; options: boolean | AddEventListenerOptions | undefined }[] = [];
  public removedListeners: string[] = [];

  addEventListener(type: string, listener: EventListenerOrEventListenerObject | null, options?: boolean | AddEventListenerOptions) {
    this.addedListeners.push({ type, options });
    super.addEventListener(type, listener, options);
  }

  removeEventListener(type: string, listener: EventListenerOrEventListenerObject | null, options?: boolean | EventListenerOptions) {
    this.removedListeners.push(type);
    super.removeEventListener(type, listener, options);
  }
}

function fireKey(target: EventTarget, type: 'keydown' | 'keyup', key: string = 'a', opts?: KeyboardEventInit) {
  target.dispatchEvent(new KeyboardEvent(type, { key, ...opts }));
}

describe('createObserver', () => {
  let target: MockTarget;
  let now: number;
  let received: KeyEvent[];
  const sink = (event: KeyEvent) => { received.push(event); };

  beforeEach(() => {
    target = new MockTarget();
    now = 1000;
    received = [];
    vi.spyOn(performance, 'now').mockImplementation(() => now);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('does not listen before start()', () => {
    createObserver(target, sink);
    fireKey(target, 'keydown');
    expect(target.addedListeners).toEqual([]);
    expect(received).toEqual([]);
  });

  it('attaches passive keydown/keyup listeners on start()', () => {
    const obs = createObserver(target, sink);
    obs.start();

    expect(target.addedListeners.map((l) => l.type)).toEqual(['keydown', 'keyup']);
    for (const l of target.addedListeners) {
      expect(l.options).toEqual({ passive: true, capture: false });
    }
    expect(obs.listening).toBe(true);
  });

  it('turns keydown and keyup into press and release events in seconds', () => {
    const obs = createObserver(target, sink);
    obs.start();

    fireKey(target, 'keydown', 'A', { code: 'KeyA' });
    now = 1087.5;
    fireKey(target, 'keyup', 'A', { code: 'KeyA' });

    expect(received).toEqual([
      { key: 'a', type: 'press', timestamp: 1, code: 'KeyA' },
      { key: 'a', type: 'release', timestamp: 1.0875, code: 'KeyA' },
    ]);
  });

  it('omits the code when the event has none', () => {
    const obs = createObserver(target, sink);
    obs.start();
    fireKey(target, 'keydown', ' ');
    expect(received).toEqual([{ key: 'space', type: 'press', timestamp: 1 }]);
  });

  it('names modifiers by side', () => {
    const obs = createObserver(target, sink);
    obs.start();
    fireKey(target, 'keydown', 'Shift', { code: 'ShiftLeft', location: 1 });
    expect(received[0].key).toBe('left shift');
  });

  it('forwards auto-repeat keydowns as presses', () => {
    const obs = createObserver(target, sink);
    obs.start();
    fireKey(target, 'keydown', 'a', { repeat: true });
    fireKey(target, 'keydown', 'a', { repeat: true });
    expect(received.map((e) => e.type)).toEqual(['press', 'press']);
  });

  it('ignores events that are not keyboard events', () => {
    const obs = createObserver(target, sink);
    obs.start();
    target.dispatchEvent(new Event('keydown'));
    expect(received).toEqual([]);
  });

  it('removes listeners on stop()', () => {
    const obs = createObserver(target, sink);
    obs.start();
    obs.stop();

    expect(target.removedListeners).toEqual(['keydown', 'keyup']);
    expect(obs.listening).toBe(false);
    fireKey(target, 'keydown');
    expect(received).toEqual([]);
  });

  it('start() and stop() are idempotent', () => {
    const obs = createObserver(target, sink);
    obs.start();
    obs.start();
    expect(target.addedListeners).toHaveLength(2);

    obs.stop();
    obs.stop();
    expect(target.removedListeners).toHaveLength(2);
  });
});
