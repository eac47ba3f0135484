import type { KeyEvent } from './types';
import { keyName } from './keys';

export interface Observer {
  start(): void;
  stop(): void;
  readonly listening: boolean;
}

function isKeyboardEvent(e: Event): e is KeyboardEvent {
  return 'key' in e && typeof e.key === 'string';
}

/**
 * Attaches passive keydown/keyup listeners to a target and hands each
 * notification to `sink` as a KeyEvent stamped with performance.now() in
 * seconds. Auto-repeat keydowns are forwarded as presses; the tracker
 * drops them.
 */
export function createObserver(
  target: EventTarget,
  sink: (event: KeyEvent) => void,
): Observer {
  const toEvent = (e: Event, type: KeyEvent['type']) => {
    if (!isKeyboardEvent(e)) return;
    const timestamp = performance.now() / 1000;
    sink(e.code ? { key: keyName(e), type, timestamp, code: e.code } : { key: keyName(e), type, timestamp });
  };

  const onKeyDown = (e: Event) => toEvent(e, 'press');
  const onKeyUp = (e: Event) => toEvent(e, 'release');

  const listenerOpts: AddEventListenerOptions = { passive: true, capture: false };
  let listening = false;

  function start() {
    if (listening) return;
    target.addEventListener('keydown', onKeyDown, listenerOpts);
    target.addEventListener('keyup', onKeyUp, listenerOpts);
    listening = true;
  }

  function stop() {
    if (!listening) return;
    target.removeEventListener('keydown', onKeyDown);
    target.removeEventListener('keyup', onKeyUp);
    listening = false;
  }

  return {
    start,
    stop,
    get listening() {
      return listening;
    },
  };
}
