import { ConfigError } from './errors';
import type { Severity } from './types';

/** Adhesion severity cut points, in milliseconds of overlap. */
export interface AdhesionThresholds {
  minor: number;
  moderate: number;
  severe: number;
}

/** Hygiene contribution of a keypress per severity band, each 0–1. */
export interface HygieneWeights {
  clean: number;
  minor: number;
  moderate: number;
  severe: number;
}

export interface HygieneConfig {
  /** Rolling window analysed for live statistics, seconds. Default: 10 */
  windowSeconds: number;
  /** Span shown by the timeline, seconds. Default: 5 */
  viewSeconds: number;
  /** Timeline cells per key. Default: 100 */
  blocks: number;
  /** Render tick interval; the view end is quantized to it. Default: 50 */
  tickMs: number;
  /** Interval between analyzer runs. Default: 1000 */
  statsIntervalMs: number;
  /** Capacity of the event queue between capture and processing. Default: 1000 */
  queueCapacity: number;
  /** Number of hotspots reported. Default: 5 */
  hotspotCount: number;
  /** Discrete fill levels per cell, empty to full. Default: 9 */
  glyphLevels: number;
  thresholds: AdhesionThresholds;
  weights: HygieneWeights;
}

export type HygieneConfigInput = Partial<Omit<HygieneConfig, 'thresholds' | 'weights'>> & {
  thresholds?: Partial<AdhesionThresholds>;
  weights?: Partial<HygieneWeights>;
};

export const DEFAULT_THRESHOLDS: AdhesionThresholds = {
  minor: 50,
  moderate: 100,
  severe: 150,
};

export const DEFAULT_WEIGHTS: HygieneWeights = {
  clean: 1.0,
  minor: 0.7,
  moderate: 0.3,
  severe: 0.0,
};

export const DEFAULT_CONFIG: HygieneConfig = {
  windowSeconds: 10,
  viewSeconds: 5,
  blocks: 100,
  tickMs: 50,
  statsIntervalMs: 1000,
  queueCapacity: 1000,
  hotspotCount: 5,
  glyphLevels: 9,
  thresholds: DEFAULT_THRESHOLDS,
  weights: DEFAULT_WEIGHTS,
};

function requirePositive(field: string, value: number) {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(field, `expected a positive number, got ${value}`);
  }
}

function requireInteger(field: string, value: number, min: number) {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(field, `expected an integer >= ${min}, got ${value}`);
  }
}

/**
 * Merge a partial configuration over `base` and validate the result.
 * Nested thresholds and weights merge field by field.
 */
export function resolveConfig(
  input?: HygieneConfigInput,
  base: HygieneConfig = DEFAULT_CONFIG,
): HygieneConfig {
  const config: HygieneConfig = {
    ...base,
    ...input,
    thresholds: { ...base.thresholds, ...input?.thresholds },
    weights: { ...base.weights, ...input?.weights },
  };

  requirePositive('windowSeconds', config.windowSeconds);
  requirePositive('viewSeconds', config.viewSeconds);
  requirePositive('tickMs', config.tickMs);
  requirePositive('statsIntervalMs', config.statsIntervalMs);
  requireInteger('blocks', config.blocks, 1);
  requireInteger('queueCapacity', config.queueCapacity, 1);
  requireInteger('hotspotCount', config.hotspotCount, 0);
  requireInteger('glyphLevels', config.glyphLevels, 2);

  const { minor, moderate, severe } = config.thresholds;
  if (!(minor >= 0 && minor <= moderate && moderate <= severe)) {
    throw new ConfigError(
      'thresholds',
      `expected 0 <= minor <= moderate <= severe, got ${minor}/${moderate}/${severe}`,
    );
  }

  const bands: Severity[] = ['clean', 'minor', 'moderate', 'severe'];
  for (const band of bands) {
    const weight = config.weights[band];
    if (!(weight >= 0 && weight <= 1)) {
      throw new ConfigError(`weights.${band}`, `expected a value in [0, 1], got ${weight}`);
    }
  }

  return config;
}
