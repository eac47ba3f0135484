import { describe, it, expect } from 'vitest';
import { cellGlyph, renderRow } from '../src/glyphs';
import type { TimelineCell } from '../src/types';

const empty: TimelineCell = { fill: 0, level: 0, shape: 'empty' };
const full: TimelineCell = { fill: 1, level: 8, shape: 'body' };

describe('cellGlyph', () => {
  it('draws empty cells as blanks', () => {
    expect(cellGlyph(empty)).toEqual({ char: ' ', inverse: false });
  });

  it('draws full cells as a full block', () => {
    expect(cellGlyph(full)).toEqual({ char: '█', inverse: false });
    expect(cellGlyph({ fill: 1, level: 8, shape: 'head' })).toEqual({ char: '█', inverse: false });
  });

  it('draws tails and islands left-aligned', () => {
    expect(cellGlyph({ fill: 0.5, level: 4, shape: 'tail' })).toEqual({ char: '▌', inverse: false });
    expect(cellGlyph({ fill: 0.375, level: 3, shape: 'island' })).toEqual({ char: '▍', inverse: false });
  });

  it('draws heads as the inverted complement', () => {
    expect(cellGlyph({ fill: 0.25, level: 2, shape: 'head' })).toEqual({ char: '▊', inverse: true });
  });

  it('maps other level counts onto eighths', () => {
    // 5 levels: level 2 of 4 is half full
    expect(cellGlyph({ fill: 0.5, level: 2, shape: 'tail' }).char).toBe('▌');
  });
});

describe('renderRow', () => {
  it('renders one character per cell', () => {
    const row = {
      key: 'a',
      cells: [full, { fill: 0.5, level: 4, shape: 'tail' as const }, empty],
      held: false,
      heldFor: null,
    };
    expect(renderRow(row)).toBe('█▌ ');
  });
});
