import type { TimelineCell, TimelineRow } from './types';

/** Left-aligned block elements from empty to full, in eighths. */
const LEFT_EIGHTHS = [' ', '▏', '▎', '▍', '▌', '▋', '▊', '▉', '█'];
const FULL = 8;

export interface Glyph {
  char: string;
  /**
   * Swap foreground and background. Terminals lack right-aligned eighths,
   * so a head cell draws the complementary left glyph inverted.
   */
  inverse: boolean;
}

function toEighths(cell: TimelineCell): number {
  return Math.round(cell.fill * FULL);
}

export function cellGlyph(cell: TimelineCell): Glyph {
  const eighths = toEighths(cell);
  if (cell.shape === 'empty' || eighths === 0) return { char: ' ', inverse: false };
  if (eighths === FULL) return { char: LEFT_EIGHTHS[FULL], inverse: false };
  if (cell.shape === 'head') return { char: LEFT_EIGHTHS[FULL - eighths], inverse: true };
  return { char: LEFT_EIGHTHS[eighths], inverse: false };
}

/** Plain-text rendering of a row's cells, one character per cell. */
export function renderRow(row: TimelineRow): string {
  let out = '';
  for (const cell of row.cells) out += cellGlyph(cell).char;
  return out;
}
