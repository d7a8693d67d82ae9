import type { Nibble, Word } from '@core/cpu/types';
import glyphs from './font.json';

// Hex digit sprites 0-F, 5 rows each, loaded at the bottom of the reserved region
export const FONT_BASE = 0x000;
export const GLYPH_HEIGHT = 5;

const flatten = (rows: number[][]): Uint8Array => {
  if (rows.length !== 16) throw new Error(`Font table must have 16 glyphs, got ${rows.length}`);
  const out = new Uint8Array(16 * GLYPH_HEIGHT);
  rows.forEach((glyph, n) => {
    if (glyph.length !== GLYPH_HEIGHT) throw new Error(`Glyph ${n.toString(16)} must have ${GLYPH_HEIGHT} rows`);
    out.set(glyph.map((b) => b & 0xFF), n * GLYPH_HEIGHT);
  });
  return out;
};

export const FONT: Uint8Array = flatten(glyphs);

export const glyphAddress = (digit: Nibble): Word => FONT_BASE + (digit & 0x0F) * GLYPH_HEIGHT;
