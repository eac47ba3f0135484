import type {
  ActiveKeys,
  CellShape,
  KeyEvent,
  TimelineCell,
  TimelineFrame,
  TimelineRow,
} from './types';
import { DEFAULT_CONFIG, type HygieneConfig } from './config';
import { compareKeys, normalizeKey } from './keys';
import { clamp, fnv1a } from './utils';

export type TimelineSettings = Pick<HygieneConfig, 'viewSeconds' | 'blocks' | 'tickMs' | 'glyphLevels'>;

export interface TimelineInput {
  /** Live event buffer; copied before use. */
  events: readonly KeyEvent[];
  /** Held keys from the tracker. */
  activeKeys: ActiveKeys;
  /** Current monotonic time in seconds. */
  now: number;
}

export interface Timeline {
  /** Build the cell grid for the view ending at the quantized `now`. */
  render(input: TimelineInput): TimelineFrame;
  /** Shift the view back into history by `offset` seconds (0 = live). */
  scrollTo(offset: number): void;
  /** Drop the cached frame, signature and snapshot. */
  clear(): void;
  readonly offset: number;
  /** Renders answered from the cache because nothing changed. */
  readonly skipped: number;
}

type Interval = readonly [start: number, end: number];

/** Slack for slice-boundary comparisons on accumulated float timestamps. */
const EPSILON = 1e-9;

/** Round `now` down to the tick grid so the view edge moves in whole ticks. */
export function quantizeTime(now: number, tickSeconds: number): number {
  return Math.floor(now / tickSeconds + EPSILON) * tickSeconds;
}

/**
 * Press intervals of one key, paired like the analyzer pairs them, plus the
 * open interval of a held key. Clipped to [viewStart, viewEnd]; empty ones dropped.
 */
export function keyIntervals(
  events: readonly KeyEvent[],
  key: string,
  activeKeys: ActiveKeys,
  viewStart: number,
  viewEnd: number,
): Interval[] {
  const raw: Interval[] = [];
  let pending: number | undefined;

  for (const event of events) {
    if (normalizeKey(event.key) !== key) continue;
    if (event.type === 'press') {
      pending = event.timestamp;
    } else if (pending !== undefined) {
      raw.push([pending, event.timestamp]);
      pending = undefined;
    }
  }

  const heldSince = activeKeys[key];
  if (heldSince !== undefined) raw.push([heldSince, Infinity]);

  const clipped: Interval[] = [];
  for (const [start, end] of raw) {
    const s = Math.max(start, viewStart);
    const e = Math.min(end, viewEnd);
    if (e > s) clipped.push([s, e]);
  }
  return clipped.sort((a, b) => a[0] - b[0]);
}

/**
 * Classify one slice against a key's intervals. A slice is a body only when
 * fully covered; otherwise the interval with the largest share decides:
 * touching the left edge means the press began earlier, touching the right
 * edge means it continues after.
 */
export function sliceCell(
  intervals: readonly Interval[],
  sliceStart: number,
  sliceEnd: number,
  levels: number,
): TimelineCell {
  const span = sliceEnd - sliceStart;
  let covered = 0;
  let share = 0;
  let left = false;
  let right = false;

  for (const [start, end] of intervals) {
    if (end <= sliceStart + EPSILON || start >= sliceEnd - EPSILON) continue;
    const part = Math.min(end, sliceEnd) - Math.max(start, sliceStart);
    covered += part;
    // Ties keep the earlier interval.
    if (part > share) {
      share = part;
      left = start <= sliceStart + EPSILON;
      right = end >= sliceEnd - EPSILON;
    }
  }

  if (covered <= 0) return { fill: 0, level: 0, shape: 'empty' };

  const top = levels - 1;
  const fraction = covered / span;
  // A sliver still shows; otherwise quick taps would vanish between glyph levels.
  const level = clamp(Math.round(fraction * top), 1, top);

  let shape: CellShape;
  if (covered >= span - EPSILON) shape = 'body';
  else if (left) shape = 'tail';
  else if (right) shape = 'head';
  else shape = 'island';

  return { fill: level / top, level, shape };
}

export function createTimeline(
  getSettings: () => TimelineSettings = () => DEFAULT_CONFIG,
): Timeline {
  let offset = 0;
  let snapshot: KeyEvent[] = [];
  let lastSignature = '';
  let lastFrame: TimelineFrame | null = null;
  let skipped = 0;

  function render(input: TimelineInput): TimelineFrame {
    const { viewSeconds, blocks, tickMs, glyphLevels } = getSettings();
    snapshot = input.events.slice();
    const activeKeys = input.activeKeys;

    const viewEnd = quantizeTime(input.now, tickMs / 1000) - offset;
    const viewStart = viewEnd - viewSeconds;

    const seen = new Set<string>();
    for (const event of snapshot) seen.add(normalizeKey(event.key));
    const held = Object.keys(activeKeys).sort(compareKeys);
    for (const key of held) seen.add(key);
    const candidates = [...seen].sort(compareKeys);

    const signature = fnv1a([
      snapshot.length,
      snapshot.length > 0 ? snapshot[0].timestamp : '',
      snapshot.length > 0 ? snapshot[snapshot.length - 1].timestamp : '',
      viewStart,
      viewEnd,
      offset,
      blocks,
      glyphLevels,
      candidates.join(','),
      held.map((key) => `${key}@${activeKeys[key]}`).join(','),
    ].join('|'));

    if (lastFrame && signature === lastSignature) {
      skipped++;
      return lastFrame;
    }

    const sliceSeconds = viewSeconds / blocks;
    const rows: TimelineRow[] = [];

    for (const key of candidates) {
      const intervals = keyIntervals(snapshot, key, activeKeys, viewStart, viewEnd);
      const touched = intervals.length > 0 || snapshot.some(
        (e) => normalizeKey(e.key) === key && e.timestamp >= viewStart && e.timestamp <= viewEnd,
      );
      if (!touched) continue;

      const cells: TimelineCell[] = new Array(blocks);
      for (let i = 0; i < blocks; i++) {
        const sliceStart = viewStart + i * sliceSeconds;
        const sliceEnd = i === blocks - 1 ? viewEnd : viewStart + (i + 1) * sliceSeconds;
        cells[i] = sliceCell(intervals, sliceStart, sliceEnd, glyphLevels);
      }

      const heldSince = activeKeys[key];
      const isHeld = heldSince !== undefined && heldSince <= viewEnd;
      rows.push({
        key,
        cells,
        held: isHeld,
        heldFor: isHeld ? viewEnd - heldSince : null,
      });
    }

    lastSignature = signature;
    lastFrame = {
      viewStart,
      viewEnd,
      offset,
      rows,
      eventCount: snapshot.length,
      signature,
    };
    return lastFrame;
  }

  return {
    render,

    scrollTo(value: number) {
      offset = Math.max(0, value);
    },

    clear() {
      snapshot = [];
      lastSignature = '';
      lastFrame = null;
      skipped = 0;
    },

    get offset() {
      return offset;
    },

    get skipped() {
      return skipped;
    },
  };
}
