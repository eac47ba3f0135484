import type {
  HygieneReport,
  KeyEvent,
  KeyListener,
  Monitor,
  MonitorConfig,
  TimelineFrame,
} from './types';
import { resolveConfig, type HygieneConfig, type HygieneConfigInput } from './config';
import { createEventQueue } from './queue';
import { createTracker } from './tracker';
import { createEventWindow } from './window';
import { createAnalyzer, NO_DATA_ADHESION_RATE, NO_DATA_HYGIENE_SCORE } from './analyzer';
import { createTimeline } from './timeline';
import { createObserver, type Observer } from './observer';
import { createSessionRecorder } from './session';
import { getLogger } from './logger';

export type {
  ActiveKeys,
  CellShape,
  HygieneReport,
  KeyEvent,
  KeyEventType,
  KeyInteraction,
  KeyListener,
  KeyMetric,
  KeySession,
  Monitor,
  MonitorConfig,
  MonitorDiagnostics,
  Overlap,
  SessionMetrics,
  Severity,
  TimelineCell,
  TimelineFrame,
  TimelineRow,
} from './types';
export type { AdhesionThresholds, HygieneConfig, HygieneConfigInput, HygieneWeights } from './config';
export { DEFAULT_CONFIG, DEFAULT_THRESHOLDS, DEFAULT_WEIGHTS, resolveConfig } from './config';
export { ConfigError, SessionFormatError } from './errors';
export {
  analyze,
  classifySeverity,
  createAnalyzer,
  detectOverlaps,
  findHotspots,
  findOverlaps,
  keysPerSecond,
  mostRecentOverlap,
  NO_DATA_ADHESION_RATE,
  NO_DATA_HYGIENE_SCORE,
  overlapBetween,
  sessionMetrics,
} from './analyzer';
export type { Analyzer, SessionMetricsOptions } from './analyzer';
export { createTracker } from './tracker';
export type { KeyTracker } from './tracker';
export { createEventQueue } from './queue';
export type { EventQueue } from './queue';
export { createEventWindow } from './window';
export type { EventWindow } from './window';
export { createTimeline, keyIntervals, quantizeTime, sliceCell } from './timeline';
export type { Timeline, TimelineInput, TimelineSettings } from './timeline';
export { cellGlyph, renderRow } from './glyphs';
export type { Glyph } from './glyphs';
export { cleanPercentage, formatOffender, hygieneGrade, offenderSeverity } from './report';
export type { HygieneGrade, OffenderSeverity } from './report';
export { createSessionRecorder, parseSession, serializeSession, sessionFileName } from './session';
export type { SessionRecorder } from './session';
export { createObserver } from './observer';
export { canonicalPair, compareKeys, keyName, keyRank, normalizeKey, pairKey } from './keys';
export { getLogger } from './logger';

const logger = getLogger('MONITOR');

/** Report published before the first analysis and after reset(). */
export function neutralReport(): HygieneReport {
  return {
    metrics: {
      totalKeypresses: 0,
      cleanKeypresses: 0,
      overlappingKeypresses: 0,
      hygieneScore: NO_DATA_HYGIENE_SCORE,
      adhesionRate: NO_DATA_ADHESION_RATE,
      totalOverlapDuration: 0,
      minorAdhesions: 0,
      moderateAdhesions: 0,
      severeAdhesions: 0,
      keyAdhesionMap: {},
    },
    hotspots: [],
    recent: null,
    keysPerSecond: 0,
  };
}

function now(): number {
  return performance.now() / 1000;
}

/**
 * Create a key adhesion monitor. Events from any source go through a
 * bounded queue; each tick drains it into the tracker and renders the
 * timeline, and each analysis scores the live window.
 */
export function createMonitor(options?: MonitorConfig): Monitor {
  const { onFrame, onReport, scheduling = 'interval', ...input } = options ?? {};
  let config: HygieneConfig = resolveConfig(input);

  let queue = createEventQueue(config.queueCapacity);
  let droppedBefore = 0;
  let overflowWarned = false;

  const tracker = createTracker();
  const live = createEventWindow(Math.max(config.windowSeconds, config.viewSeconds));
  const timeline = createTimeline(() => config);
  const analyzer = createAnalyzer(() => config);
  const recorder = createSessionRecorder();

  let observer: Observer | null = null;
  let running = false;
  let tickTimer: ReturnType<typeof setInterval> | undefined;
  let statsTimer: ReturnType<typeof setInterval> | undefined;
  let strayReleases = 0;
  let lastFrame: TimelineFrame | null = null;
  let lastReport = neutralReport();

  tracker.addListener((event, keys) => {
    if (event.type === 'release' && keys[event.key] === undefined) {
      strayReleases++;
      return;
    }
    live.push(event);
  });

  function ingest(event: KeyEvent): boolean {
    if (queue.offer(event)) return true;
    if (!overflowWarned) {
      overflowWarned = true;
      logger.warn(`Event queue full (capacity ${queue.capacity}), dropping new events`);
    }
    return false;
  }

  function tick(): TimelineFrame {
    queue.drain((event) => {
      recorder.record(event);
      tracker.process(event);
    });

    const frame = timeline.render({
      events: live.toArray(),
      activeKeys: tracker.activeKeys(),
      now: now(),
    });
    if (frame !== lastFrame) {
      lastFrame = frame;
      onFrame?.(frame);
    }
    return frame;
  }

  function analyze(): HygieneReport {
    const events = live.toArray();
    const windowed = events.length > 0
      ? live.since(events[events.length - 1].timestamp - config.windowSeconds)
      : events;
    lastReport = analyzer.report(windowed);
    onReport?.(lastReport);
    return lastReport;
  }

  function startTimers() {
    if (scheduling !== 'interval') return;
    tickTimer = setInterval(tick, config.tickMs);
    statsTimer = setInterval(analyze, config.statsIntervalMs);
  }

  function stopTimers() {
    if (tickTimer !== undefined) { clearInterval(tickTimer); tickTimer = undefined; }
    if (statsTimer !== undefined) { clearInterval(statsTimer); statsTimer = undefined; }
  }

  function start() {
    if (running) return;
    running = true;
    observer?.start();
    startTimers();
  }

  function stop() {
    if (!running) return;
    running = false;
    observer?.stop();
    stopTimers();
    // The producer is gone; whatever it already queued still counts.
    if (queue.length > 0) tick();
  }

  function attach(target: EventTarget) {
    detach();
    observer = createObserver(target, ingest);
    if (running) observer.start();
  }

  function detach() {
    if (!observer) return;
    observer.stop();
    observer = null;
  }

  function configure(update: HygieneConfigInput): HygieneConfig {
    const previous = config;
    config = resolveConfig(update, previous);
    live.span = Math.max(config.windowSeconds, config.viewSeconds);

    if (config.queueCapacity !== previous.queueCapacity) {
      const resized = createEventQueue(config.queueCapacity);
      droppedBefore += queue.dropped;
      queue.drain((event) => { resized.offer(event); });
      queue = resized;
    }

    if (running && (config.tickMs !== previous.tickMs || config.statsIntervalMs !== previous.statsIntervalMs)) {
      stopTimers();
      startTimers();
    }

    logger.info(`Configuration updated: window=${config.windowSeconds}s, view=${config.viewSeconds}s, blocks=${config.blocks}`);
    return config;
  }

  function subscribe(listener: KeyListener): () => void {
    tracker.addListener(listener);
    return () => tracker.removeListener(listener);
  }

  function reset() {
    queue.clear();
    tracker.clear();
    live.clear();
    timeline.clear();
    strayReleases = 0;
    overflowWarned = false;
    lastFrame = null;
    lastReport = neutralReport();
  }

  function destroy() {
    stop();
    detach();
    reset();
  }

  return {
    ingest,
    attach,
    detach,
    start,
    stop,
    tick,
    analyze,
    report: () => lastReport,
    configure,
    config: () => config,
    scrollTo: (offset: number) => timeline.scrollTo(offset),
    subscribe,
    activeKeys: () => tracker.activeKeys(),
    events: () => live.toArray(),
    startRecording: (metadata?: Record<string, unknown>) => recorder.start(now(), metadata),
    stopRecording: () => recorder.stop(now()),
    get recording() {
      return recorder.recording;
    },
    diagnostics: () => ({
      queued: queue.length,
      dropped: droppedBefore + queue.dropped,
      strayReleases,
      listenerFailures: tracker.listenerFailures,
      framesSkipped: timeline.skipped,
    }),
    reset,
    destroy,
  };
}
