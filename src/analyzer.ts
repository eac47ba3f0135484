import type {
  HygieneReport,
  KeyEvent,
  KeyInteraction,
  KeyMetric,
  Overlap,
  SessionMetrics,
  Severity,
} from './types';
import {
  DEFAULT_THRESHOLDS,
  DEFAULT_WEIGHTS,
  type AdhesionThresholds,
  type HygieneConfig,
  type HygieneWeights,
} from './config';
import { canonicalPair, normalizeKey, pairKey } from './keys';
import { mean } from './utils';

/** Hygiene score reported for a window without a single completed keypress. */
export const NO_DATA_HYGIENE_SCORE = 100;
/** Adhesion rate reported for a window without a single completed keypress. */
export const NO_DATA_ADHESION_RATE = 0;

const DEFAULT_HOTSPOTS = 5;

export interface SessionMetricsOptions {
  thresholds?: AdhesionThresholds;
  weights?: HygieneWeights;
}

/**
 * Pair presses with releases in a single forward scan.
 * Only the most recent unmatched press of a key can be paired; a release
 * without one is dropped, and a press still open at the end yields nothing.
 */
export function analyze(events: readonly KeyEvent[]): KeyMetric[] {
  const metrics: KeyMetric[] = [];
  const pending = new Map<string, number>();

  for (const event of events) {
    const key = normalizeKey(event.key);
    if (event.type === 'press') {
      pending.set(key, event.timestamp);
      continue;
    }
    const pressTime = pending.get(key);
    if (pressTime === undefined) continue;
    pending.delete(key);
    metrics.push({
      key,
      pressTime,
      releaseTime: event.timestamp,
      duration: event.timestamp - pressTime,
    });
  }

  return metrics;
}

/** Length of the intersection of two press intervals; 0 when they are disjoint. */
export function overlapBetween(a: KeyMetric, b: KeyMetric): number {
  if (!(a.pressTime < b.releaseTime && b.pressTime < a.releaseTime)) return 0;
  const duration = Math.min(a.releaseTime, b.releaseTime) - Math.max(a.pressTime, b.pressTime);
  return duration > 0 ? duration : 0;
}

/** Visit every pair (i < j) of distinct keys with a positive overlap. */
function forEachOverlap(
  metrics: readonly KeyMetric[],
  visit: (i: number, j: number, duration: number) => void,
) {
  for (let i = 0; i < metrics.length; i++) {
    for (let j = i + 1; j < metrics.length; j++) {
      if (metrics[i].key === metrics[j].key) continue;
      const duration = overlapBetween(metrics[i], metrics[j]);
      if (duration > 0) visit(i, j, duration);
    }
  }
}

/** All overlaps in pairwise scan order. O(n²) over the window. */
export function findOverlaps(metrics: readonly KeyMetric[]): Overlap[] {
  const overlaps: Overlap[] = [];
  forEachOverlap(metrics, (i, j, duration) => {
    const first = metrics[i];
    const second = metrics[j];
    overlaps.push({
      first,
      second,
      start: Math.max(first.pressTime, second.pressTime),
      end: Math.min(first.releaseTime, second.releaseTime),
      duration,
    });
  });
  return overlaps;
}

/**
 * Overlap duration per canonical pair ('a+s'). When a pair overlaps
 * more than once the last occurrence found wins.
 */
export function detectOverlaps(metrics: readonly KeyMetric[]): Map<string, number> {
  const overlaps = new Map<string, number>();
  forEachOverlap(metrics, (i, j, duration) => {
    overlaps.set(pairKey(metrics[i].key, metrics[j].key), duration);
  });
  return overlaps;
}

/**
 * Worst key pairs by average overlap. Pairs with equal averages keep
 * the order in which they were first found.
 */
export function findHotspots(
  metrics: readonly KeyMetric[],
  topN: number = DEFAULT_HOTSPOTS,
): KeyInteraction[] {
  const groups = new Map<string, { key1: string; key2: string; overlaps: number[]; pressTotal: number }>();

  forEachOverlap(metrics, (i, j, duration) => {
    const [key1, key2] = canonicalPair(metrics[i].key, metrics[j].key);
    const id = `${key1}+${key2}`;
    let group = groups.get(id);
    if (!group) {
      group = { key1, key2, overlaps: [], pressTotal: 0 };
      groups.set(id, group);
    }
    group.overlaps.push(duration);
    group.pressTotal += metrics[i].duration + metrics[j].duration;
  });

  const hotspots: KeyInteraction[] = [];
  for (const group of groups.values()) {
    const total = group.overlaps.reduce((sum, d) => sum + d, 0);
    hotspots.push({
      key1: group.key1,
      key2: group.key2,
      overlapDuration: mean(group.overlaps),
      overlapPercentage: group.pressTotal > 0 ? (total / group.pressTotal) * 100 : 0,
      occurrences: group.overlaps.length,
    });
  }

  hotspots.sort((a, b) => b.overlapDuration - a.overlapDuration);
  return hotspots.slice(0, Math.max(0, topN));
}

/**
 * The overlap whose intersection ends last. Ties keep the first found.
 * Keys are reported in scan order, not canonical order.
 */
export function mostRecentOverlap(metrics: readonly KeyMetric[]): KeyInteraction | null {
  let best: KeyInteraction | null = null;
  let bestEnd = -Infinity;

  forEachOverlap(metrics, (i, j, duration) => {
    const first = metrics[i];
    const second = metrics[j];
    const end = Math.min(first.releaseTime, second.releaseTime);
    if (end <= bestEnd) return;
    bestEnd = end;
    const pressTotal = first.duration + second.duration;
    best = {
      key1: first.key,
      key2: second.key,
      overlapDuration: duration,
      overlapPercentage: pressTotal > 0 ? (duration / pressTotal) * 100 : 0,
      occurrences: 1,
    };
  });

  return best;
}

/** Severity band of an overlap (seconds) against cut points in milliseconds. */
export function classifySeverity(
  duration: number,
  thresholds: AdhesionThresholds = DEFAULT_THRESHOLDS,
): Severity {
  const ms = duration * 1000;
  if (ms <= 0) return 'clean';
  if (ms < thresholds.minor) return 'minor';
  if (ms < thresholds.severe) return 'moderate';
  return 'severe';
}

/**
 * Aggregate statistics for a window. Each keypress is classified by the
 * largest overlap it takes part in, so a press overlapping two keys counts once.
 */
export function sessionMetrics(
  metrics: readonly KeyMetric[],
  options?: SessionMetricsOptions,
): SessionMetrics {
  const thresholds = options?.thresholds ?? DEFAULT_THRESHOLDS;
  const weights = options?.weights ?? DEFAULT_WEIGHTS;

  const worst = new Array<number>(metrics.length).fill(0);
  let totalOverlapDuration = 0;
  forEachOverlap(metrics, (i, j, duration) => {
    totalOverlapDuration += duration;
    if (duration > worst[i]) worst[i] = duration;
    if (duration > worst[j]) worst[j] = duration;
  });

  const bands: Record<Severity, number> = { clean: 0, minor: 0, moderate: 0, severe: 0 };
  const keyAdhesionMap: Record<string, number> = {};
  let weighted = 0;

  for (let i = 0; i < metrics.length; i++) {
    const band = classifySeverity(worst[i], thresholds);
    bands[band]++;
    weighted += weights[band];
    if (band !== 'clean') {
      const key = metrics[i].key;
      keyAdhesionMap[key] = (keyAdhesionMap[key] ?? 0) + 1;
    }
  }

  const total = metrics.length;
  const overlapping = total - bands.clean;

  return {
    totalKeypresses: total,
    cleanKeypresses: bands.clean,
    overlappingKeypresses: overlapping,
    hygieneScore: total > 0 ? (100 * weighted) / total : NO_DATA_HYGIENE_SCORE,
    adhesionRate: total > 0 ? (overlapping / total) * 100 : NO_DATA_ADHESION_RATE,
    totalOverlapDuration,
    minorAdhesions: bands.minor,
    moderateAdhesions: bands.moderate,
    severeAdhesions: bands.severe,
    keyAdhesionMap,
  };
}

/** Presses within `window` seconds of the latest event, per second. */
export function keysPerSecond(events: readonly KeyEvent[], window: number = 1.0): number {
  if (events.length === 0 || !(window > 0)) return 0;
  const latest = events[events.length - 1].timestamp;
  let presses = 0;
  for (const event of events) {
    if (event.type === 'press' && latest - event.timestamp <= window) presses++;
  }
  return presses / window;
}

export interface Analyzer {
  /** Full statistics for one window of events. */
  report(events: readonly KeyEvent[]): HygieneReport;
}

export function createAnalyzer(
  getConfig: () => Pick<HygieneConfig, 'thresholds' | 'weights' | 'hotspotCount'>,
): Analyzer {
  return {
    report(events: readonly KeyEvent[]): HygieneReport {
      const { thresholds, weights, hotspotCount } = getConfig();
      const metrics = analyze(events);
      return {
        metrics: sessionMetrics(metrics, { thresholds, weights }),
        hotspots: findHotspots(metrics, hotspotCount),
        recent: mostRecentOverlap(metrics),
        keysPerSecond: keysPerSecond(events),
      };
    },
  };
}
