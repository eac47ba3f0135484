import { describe, it, expect } from 'vitest';
import { cleanPercentage, formatOffender, hygieneGrade, offenderSeverity } from '../src/report';
import { neutralReport } from '../src/index';
import type { KeyInteraction } from '../src/types';

function interaction(key1: string, key2: string, overlapDuration: number): KeyInteraction {
  return { key1, key2, overlapDuration, overlapPercentage: 10, occurrences: 1 };
}

describe('hygieneGrade', () => {
  it('grades by score', () => {
    expect(hygieneGrade(100)).toBe('excellent');
    expect(hygieneGrade(80)).toBe('excellent');
    expect(hygieneGrade(79.9)).toBe('good');
    expect(hygieneGrade(60)).toBe('good');
    expect(hygieneGrade(40)).toBe('fair');
    expect(hygieneGrade(39)).toBe('poor');
  });
});

describe('cleanPercentage', () => {
  it('is 100 with no keypresses', () => {
    expect(cleanPercentage(neutralReport().metrics)).toBe(100);
  });

  it('is the share of clean keypresses', () => {
    const metrics = { ...neutralReport().metrics, totalKeypresses: 8, cleanKeypresses: 6 };
    expect(cleanPercentage(metrics)).toBe(75);
  });
});

describe('offenderSeverity', () => {
  it('uses the minor and moderate cut points', () => {
    expect(offenderSeverity(interaction('a', 's', 0.03125))).toBe('minor');
    expect(offenderSeverity(interaction('a', 's', 0.0625))).toBe('moderate');
    expect(offenderSeverity(interaction('a', 's', 0.125))).toBe('severe');
  });

  it('honours custom cut points', () => {
    const thresholds = { minor: 10, moderate: 20, severe: 30 };
    expect(offenderSeverity(interaction('a', 's', 0.015625), thresholds)).toBe('moderate');
  });
});

describe('formatOffender', () => {
  it('formats a ranked line', () => {
    expect(formatOffender(1, interaction('a', 's', 0.0625))).toBe('1. [A]+[S]: 62ms MODERATE');
    expect(formatOffender(2, interaction('d', 'f', 0.125))).toBe('2. [D]+[F]: 125ms SEVERE');
    expect(formatOffender(3, interaction('left shift', 'b', 0.03125))).toBe('3. [LEFT SHIFT]+[B]: 31ms MINOR');
  });
});
