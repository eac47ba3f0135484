import type { HygieneConfig, HygieneConfigInput } from './config';

export type KeyEventType = 'press' | 'release';

/** A single press or release notification from the event source. */
export interface KeyEvent {
  /** Case-insensitive key identifier (e.g. 'w', 'space', 'left shift') */
  readonly key: string;
  readonly type: KeyEventType;
  /** Monotonic timestamp in seconds, sub-millisecond resolution */
  readonly timestamp: number;
  /** Platform key code, when the source knows it */
  readonly code?: string;
}

/** Frozen snapshot of held keys: key → press timestamp. */
export type ActiveKeys = Readonly<Record<string, number>>;

export type KeyListener = (event: KeyEvent, activeKeys: ActiveKeys) => void;

/** A press matched to its release. */
export interface KeyMetric {
  key: string;
  pressTime: number;
  releaseTime: number;
  /** releaseTime - pressTime, in seconds */
  duration: number;
}

/** Two key metrics whose intervals intersect with positive measure, in scan order. */
export interface Overlap {
  first: KeyMetric;
  second: KeyMetric;
  start: number;
  end: number;
  duration: number;
}

export interface KeyInteraction {
  key1: string;
  key2: string;
  /** Seconds. Average over occurrences for hotspots, single overlap otherwise. */
  overlapDuration: number;
  /** Overlap ÷ combined press duration of both keys × 100 */
  overlapPercentage: number;
  /** Number of overlaps aggregated into this interaction */
  occurrences: number;
}

export type Severity = 'clean' | 'minor' | 'moderate' | 'severe';

export interface SessionMetrics {
  totalKeypresses: number;
  cleanKeypresses: number;
  overlappingKeypresses: number;
  /** 0–100; 100 when the window holds no completed keypress */
  hygieneScore: number;
  /** Overlapping ÷ total × 100; 0 when the window is empty */
  adhesionRate: number;
  /** Sum of all pairwise overlap durations, in seconds */
  totalOverlapDuration: number;
  minorAdhesions: number;
  moderateAdhesions: number;
  severeAdhesions: number;
  /** Key → number of its keypresses that overlapped another key */
  keyAdhesionMap: Record<string, number>;
}

export interface HygieneReport {
  metrics: SessionMetrics;
  hotspots: KeyInteraction[];
  recent: KeyInteraction | null;
  keysPerSecond: number;
}

export type CellShape = 'empty' | 'head' | 'tail' | 'body' | 'island';

export interface TimelineCell {
  /** Covered fraction of the slice after quantization, 0–1 */
  fill: number;
  /** Discrete glyph level, 0 … glyphLevels - 1 */
  level: number;
  shape: CellShape;
}

export interface TimelineRow {
  key: string;
  cells: TimelineCell[];
  /** True while the key is held at the view end */
  held: boolean;
  /** Seconds the key has been held at the view end, null when released */
  heldFor: number | null;
}

export interface TimelineFrame {
  viewStart: number;
  viewEnd: number;
  offset: number;
  rows: TimelineRow[];
  eventCount: number;
  signature: string;
}

/** Plain serializable record of a recorded session. */
export interface KeySession {
  startTime: number;
  endTime: number;
  metadata: Record<string, unknown>;
  events: KeyEvent[];
}

export interface MonitorDiagnostics {
  /** Events waiting for the next tick */
  queued: number;
  /** Events dropped because the queue was full */
  dropped: number;
  /** Releases that arrived without a held press */
  strayReleases: number;
  /** Key listeners that threw */
  listenerFailures: number;
  /** Timeline renders skipped because nothing changed */
  framesSkipped: number;
}

export interface MonitorConfig extends HygieneConfigInput {
  /** Called after a tick produced a new timeline frame */
  onFrame?: (frame: TimelineFrame) => void;
  /** Called after every analysis */
  onReport?: (report: HygieneReport) => void;
  /** 'interval' runs tick/analyze on timers after start(); 'manual' leaves it to the caller. Default: 'interval' */
  scheduling?: 'interval' | 'manual';
}

export interface Monitor {
  /** Queue an event from any source. Returns false when the queue is full. */
  ingest(event: KeyEvent): boolean;
  /** Capture keydown/keyup from a DOM target (replaces any previous target). */
  attach(target: EventTarget): void;
  /** Stop capturing from the attached target. */
  detach(): void;
  /** Start capture and, with interval scheduling, the tick and analysis timers */
  start(): void;
  /** Stop capture and timers; events already queued are still processed */
  stop(): void;
  /** Drain the queue through the tracker and render the timeline */
  tick(): TimelineFrame;
  /** Compute statistics over the live window */
  analyze(): HygieneReport;
  /** Latest report without recomputing */
  report(): HygieneReport;
  /** Adjust configuration without stopping capture */
  configure(input: HygieneConfigInput): HygieneConfig;
  config(): HygieneConfig;
  /** Look back into history by `offset` seconds; 0 follows live input */
  scrollTo(offset: number): void;
  /** Listen to every event the tracker accepts. Returns an unsubscribe function. */
  subscribe(listener: KeyListener): () => void;
  activeKeys(): ActiveKeys;
  /** Copy of the live window */
  events(): KeyEvent[];
  startRecording(metadata?: Record<string, unknown>): void;
  stopRecording(): KeySession | null;
  readonly recording: boolean;
  diagnostics(): MonitorDiagnostics;
  /** Clear all state and statistics; capture and recording keep running */
  reset(): void;
  /** Stop, detach and reset */
  destroy(): void;
}
