import keyOrder from './data/key-order.json';

/** Rank of a key in the physical layout, row by row. Unknown keys rank after all of these. */
const CANONICAL_ORDER: Readonly<Record<string, number>> = keyOrder;

const UNKNOWN_RANK = 1000;

const LOCATION_LEFT = 1;
const LOCATION_RIGHT = 2;

const MODIFIER_NAMES: Readonly<Record<string, string>> = {
  Shift: 'shift',
  Control: 'ctrl',
  Alt: 'alt',
  AltGraph: 'alt',
  Meta: 'meta',
};

const NAMED_KEYS: Readonly<Record<string, string>> = {
  ' ': 'space',
  Escape: 'esc',
  ArrowLeft: 'left',
  ArrowRight: 'right',
  ArrowUp: 'up',
  ArrowDown: 'down',
};

export function normalizeKey(key: string): string {
  return key.trim().toLowerCase() || key;
}

export function keyRank(key: string): number {
  const rank = CANONICAL_ORDER[normalizeKey(key)];
  return rank === undefined ? UNKNOWN_RANK : rank;
}

/** Layout order first, then lexicographic. Unknown keys sort last. */
export function compareKeys(a: string, b: string): number {
  const diff = keyRank(a) - keyRank(b);
  if (diff !== 0) return diff;
  const na = normalizeKey(a);
  const nb = normalizeKey(b);
  return na < nb ? -1 : na > nb ? 1 : 0;
}

export function canonicalPair(a: string, b: string): [string, string] {
  const na = normalizeKey(a);
  const nb = normalizeKey(b);
  return compareKeys(na, nb) <= 0 ? [na, nb] : [nb, na];
}

/** Lookup key for an unordered pair, e.g. 'a+s'. */
export function pairKey(a: string, b: string): string {
  const [first, second] = canonicalPair(a, b);
  return `${first}+${second}`;
}

/** Readable identifier for a DOM keyboard event. */
export function keyName(event: Pick<KeyboardEvent, 'key' | 'code' | 'location'>): string {
  const modifier = MODIFIER_NAMES[event.key];
  if (modifier !== undefined) {
    if (event.location === LOCATION_LEFT) return `left ${modifier}`;
    if (event.location === LOCATION_RIGHT) return `right ${modifier}`;
    return modifier;
  }

  const named = NAMED_KEYS[event.key];
  if (named !== undefined) return named;

  if (!event.key || event.key === 'Unidentified') {
    return event.code ? normalizeKey(event.code) : 'unidentified';
  }
  return normalizeKey(event.key);
}
