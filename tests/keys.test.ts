import { describe, it, expect } from 'vitest';
import { canonicalPair, compareKeys, keyName, keyRank, normalizeKey, pairKey } from '../src/keys';

describe('normalizeKey', () => {
  it('lowercases and trims', () => {
    expect(normalizeKey('A')).toBe('a');
    expect(normalizeKey(' Left Shift ')).toBe('left shift');
  });

  it('keeps a whitespace-only key as is', () => {
    expect(normalizeKey(' ')).toBe(' ');
  });
});

describe('keyRank', () => {
  it('follows the physical layout', () => {
    expect(keyRank('esc')).toBe(0);
    expect(keyRank('q')).toBeLessThan(keyRank('a'));
    expect(keyRank('a')).toBeLessThan(keyRank('z'));
    expect(keyRank('z')).toBeLessThan(keyRank('space'));
  });

  it('ranks unknown keys after all known ones', () => {
    expect(keyRank('mystery')).toBe(1000);
    expect(keyRank('mystery')).toBeGreaterThan(keyRank('f12'));
  });

  it('is case-insensitive', () => {
    expect(keyRank('A')).toBe(keyRank('a'));
  });
});

describe('compareKeys', () => {
  it('sorts by layout order', () => {
    expect(['space', 'a', 'left shift', 'q', 'esc'].sort(compareKeys)).toEqual([
      'esc',
      'q',
      'a',
      'left shift',
      'space',
    ]);
  });

  it('sorts unknown keys last, lexicographically', () => {
    expect(['zeta', 'a', 'alpha'].sort(compareKeys)).toEqual(['a', 'alpha', 'zeta']);
  });
});

describe('canonicalPair / pairKey', () => {
  it('orders a pair regardless of argument order', () => {
    expect(canonicalPair('s', 'a')).toEqual(['a', 's']);
    expect(canonicalPair('a', 's')).toEqual(['a', 's']);
    expect(pairKey('S', 'a')).toBe('a+s');
  });

  it('puts a modifier before a letter on a lower row', () => {
    expect(pairKey('b', 'left shift')).toBe('left shift+b');
  });
});

describe('keyName', () => {
  it('names modifiers by side', () => {
    expect(keyName({ key: 'Shift', code: 'ShiftLeft', location: 1 })).toBe('left shift');
    expect(keyName({ key: 'Control', code: 'ControlRight', location: 2 })).toBe('right ctrl');
    expect(keyName({ key: 'Meta', code: '', location: 0 })).toBe('meta');
  });

  it('maps named keys', () => {
    expect(keyName({ key: ' ', code: 'Space', location: 0 })).toBe('space');
    expect(keyName({ key: 'Escape', code: 'Escape', location: 0 })).toBe('esc');
    expect(keyName({ key: 'ArrowUp', code: 'ArrowUp', location: 0 })).toBe('up');
  });

  it('lowercases printable keys', () => {
    expect(keyName({ key: 'W', code: 'KeyW', location: 0 })).toBe('w');
    expect(keyName({ key: 'Enter', code: 'Enter', location: 0 })).toBe('enter');
  });

  it('falls back to the code for unidentified keys', () => {
    expect(keyName({ key: 'Unidentified', code: 'KeyQ', location: 0 })).toBe('keyq');
    expect(keyName({ key: '', code: '', location: 0 })).toBe('unidentified');
  });
});
