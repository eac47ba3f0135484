import type { ActiveKeys, KeyEvent, KeyListener } from './types';
import { normalizeKey } from './keys';
import { getLogger } from './logger';

const logger = getLogger('TRACKER');

const EMPTY_SNAPSHOT: ActiveKeys = Object.freeze({});

export interface KeyTracker {
  /**
   * Apply one event. Returns false only for a repeat press of a held key,
   * which is neither recorded nor forwarded.
   */
  process(event: KeyEvent): boolean;
  addListener(listener: KeyListener): void;
  removeListener(listener: KeyListener): void;
  /** Frozen copy of the held keys. */
  activeKeys(): ActiveKeys;
  /** Reset held keys without notifying listeners. */
  clear(): void;
  /** Number of held keys. */
  readonly size: number;
  readonly listenerCount: number;
  /** Listener invocations that threw. */
  readonly listenerFailures: number;
}

/**
 * Single owner of the held-key state. Listeners receive the normalized
 * event and an immutable snapshot; they never see the live map.
 */
export function createTracker(): KeyTracker {
  const active = new Map<string, number>();
  const listeners = new Set<KeyListener>();
  let listenerFailures = 0;

  function snapshot(): ActiveKeys {
    const copy: Record<string, number> = {};
    for (const [key, pressTime] of active) copy[key] = pressTime;
    return Object.freeze(copy);
  }

  function notify(event: KeyEvent, keys: ActiveKeys) {
    // Copy so a listener removing itself does not skip its neighbour.
    for (const listener of [...listeners]) {
      try {
        listener(event, keys);
      } catch (err) {
        listenerFailures++;
        logger.error(`Listener failed on ${event.type} ${event.key}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  function process(raw: KeyEvent): boolean {
    const key = normalizeKey(raw.key);
    const event: KeyEvent = key === raw.key ? raw : { ...raw, key };

    if (event.type === 'press') {
      if (active.has(key)) {
        logger.debug(`Ignoring repeat press for ${key}`);
        return false;
      }
      active.set(key, event.timestamp);
      notify(event, snapshot());
      return true;
    }

    if (active.has(key)) {
      // Listeners still see the press time of the key being released.
      notify(event, snapshot());
      active.delete(key);
    } else {
      logger.debug(`Release of ${key} without a held press, forwarding with empty snapshot`);
      notify(event, EMPTY_SNAPSHOT);
    }
    return true;
  }

  return {
    process,

    addListener(listener: KeyListener) {
      if (listeners.has(listener)) return;
      listeners.add(listener);
      logger.debug(`Added listener, total=${listeners.size}`);
    },

    removeListener(listener: KeyListener) {
      if (listeners.delete(listener)) {
        logger.debug(`Removed listener, remaining=${listeners.size}`);
      }
    },

    activeKeys: snapshot,

    clear() {
      active.clear();
    },

    get size() {
      return active.size;
    },

    get listenerCount() {
      return listeners.size;
    },

    get listenerFailures() {
      return listenerFailures;
    },
  };
}
