import type { Font } from "../fonts";

/**
 * Measured width of `text` used for every layout decision.
 *
 * Untracked text uses the font's bounding box. Tracked text sums advance
 * widths and inserts tracking only between characters, never after the last.
 *
 * Differs from drawAdvance() by one `tracking` step: the glyph cursor also
 * adds tracking after the final character.
 */
export function textWidth(text: string, font: Font, tracking = 0): number {
  if (tracking === 0) {
    return font.boundingBoxWidth(text);
  }
  const chars = Array.from(text);
  if (chars.length === 0) return 0;
  let width = 0;
  for (const char of chars) {
    width += font.advanceWidth(char);
  }
  return width + tracking * (chars.length - 1);
}

export interface GlyphPosition {
  char: string;
  x: number;
}

/**
 * Per-character draw positions: the cursor advances by
 * `advanceWidth(c) + tracking` after every character.
 */
export function trackedGlyphPositions(
  text: string,
  font: Font,
  x: number,
  tracking: number
): GlyphPosition[] {
  const glyphs: GlyphPosition[] = [];
  let cursor = x;
  for (const char of text) {
    glyphs.push({ char, x: cursor });
    cursor += font.advanceWidth(char) + tracking;
  }
  return glyphs;
}

/** Total cursor travel of the tracked draw routine. */
export function drawAdvance(text: string, font: Font, tracking: number): number {
  let advance = 0;
  for (const char of text) {
    advance += font.advanceWidth(char) + tracking;
  }
  return advance;
}
