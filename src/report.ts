import type { KeyInteraction, SessionMetrics } from './types';
import { DEFAULT_THRESHOLDS, type AdhesionThresholds } from './config';

export type HygieneGrade = 'excellent' | 'good' | 'fair' | 'poor';

export type OffenderSeverity = 'minor' | 'moderate' | 'severe';

export function hygieneGrade(score: number): HygieneGrade {
  if (score >= 80) return 'excellent';
  if (score >= 60) return 'good';
  if (score >= 40) return 'fair';
  return 'poor';
}

/** Share of keypresses without any overlap; 100 when nothing was typed yet. */
export function cleanPercentage(metrics: SessionMetrics): number {
  if (metrics.totalKeypresses === 0) return 100;
  return (metrics.cleanKeypresses / metrics.totalKeypresses) * 100;
}

/**
 * Alert level of a hotspot from its average overlap. Uses the minor and
 * moderate cut points: anything past `moderate` is already an offender.
 */
export function offenderSeverity(
  interaction: KeyInteraction,
  thresholds: AdhesionThresholds = DEFAULT_THRESHOLDS,
): OffenderSeverity {
  const ms = interaction.overlapDuration * 1000;
  if (ms < thresholds.minor) return 'minor';
  if (ms < thresholds.moderate) return 'moderate';
  return 'severe';
}

/** One line of the worst-offenders list, e.g. `1. [A]+[S]: 62ms MODERATE`. */
export function formatOffender(
  rank: number,
  interaction: KeyInteraction,
  thresholds: AdhesionThresholds = DEFAULT_THRESHOLDS,
): string {
  const ms = Math.trunc(interaction.overlapDuration * 1000);
  const severity = offenderSeverity(interaction, thresholds).toUpperCase();
  return `${rank}. [${interaction.key1.toUpperCase()}]+[${interaction.key2.toUpperCase()}]: ${ms}ms ${severity}`;
}
