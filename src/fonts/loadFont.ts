import * as fs from "fs";
import * as path from "path";
import * as opentype from "opentype.js";
import { AssetError } from "../lib/errors";
import { createFallbackFont } from "./fallback";
import type { Font } from "./types";

export const DEFAULT_BASELINE_CORRECTION = 2;

interface InkExtent {
  /** Pen advance of the whole string, kerning included. */
  advance: number;
  /** Leftmost and rightmost inked x, or null for a string without ink. */
  left: number | null;
  right: number | null;
}

/**
 * Walk `text` in font units, the way opentype.js lays it out for getPath().
 */
function measureInk(font: opentype.Font, text: string): InkExtent {
  let left: number | null = null;
  let right: number | null = null;

  const advance = font.forEachGlyph(text, 0, 0, font.unitsPerEm, undefined, (glyph, x) => {
    if (glyph.path.commands.length === 0) return;
    const metrics = glyph.getMetrics();
    const glyphLeft = x + metrics.xMin;
    const glyphRight = x + metrics.xMax;
    left = left === null ? glyphLeft : Math.min(left, glyphLeft);
    right = right === null ? glyphRight : Math.max(right, glyphRight);
  });

  return { advance, left, right };
}

/**
 * Scale a parsed OpenType font to a pixel size.
 */
export function fontFromOpenType(
  font: opentype.Font,
  size: number,
  baselineCorrection = DEFAULT_BASELINE_CORRECTION,
  family = font.getEnglishName("fontFamily")
): Font {
  // Multiply before dividing so round unit values stay exact in pixels.
  const scale = (units: number): number => (units * size) / font.unitsPerEm;
  const hheaLineGap: unknown = font.tables.hhea?.lineGap;
  const lineGap = typeof hheaLineGap === "number" ? hheaLineGap : 0;

  return {
    family,
    size,
    ascent: scale(font.ascender),
    descent: scale(Math.abs(font.descender)),
    lineHeight: scale(font.ascender + Math.abs(font.descender) + lineGap),
    baselineCorrection,
    advanceWidth: (char) => scale(font.charToGlyph(char).advanceWidth ?? 0),
    boundingBoxWidth(text: string): number {
      if (text.length === 0) return 0;
      const ink = measureInk(font, text);
      if (ink.left === null || ink.right === null) return scale(ink.advance);
      return scale(ink.right - ink.left);
    },
    leftBearing(text: string): number {
      if (text.length === 0) return 0;
      return scale(measureInk(font, text).left ?? 0);
    },
    outline: (text, x, baseline) => font.getPath(text, x, baseline, size).toPathData(2),
  };
}

/**
 * Load an OpenType (.otf/.ttf) font and scale it to `size` pixels.
 * Throws AssetError when the file is missing or cannot be parsed.
 */
export function loadFont(
  fontPath: string,
  size: number,
  baselineCorrection = DEFAULT_BASELINE_CORRECTION
): Font {
  if (!fs.existsSync(fontPath)) {
    throw new AssetError(`Font not found: ${fontPath}`, fontPath);
  }

  let parsed: opentype.Font;
  try {
    parsed = opentype.loadSync(fontPath);
  } catch (err) {
    throw new AssetError(
      `Cannot parse font ${fontPath}: ${err instanceof Error ? err.message : String(err)}`,
      fontPath
    );
  }

  const family = parsed.getEnglishName("fontFamily") || path.basename(fontPath, path.extname(fontPath));
  return fontFromOpenType(parsed, size, baselineCorrection, family);
}

/**
 * Fail-soft font loading: on any AssetError the builtin fallback font is used
 * and the reason is returned as a warning. Layout proceeds either way.
 */
export function loadFontOrFallback(
  fontPath: string,
  size: number,
  baselineCorrection = DEFAULT_BASELINE_CORRECTION
): { font: Font; warning: string | null } {
  try {
    return { font: loadFont(fontPath, size, baselineCorrection), warning: null };
  } catch (err) {
    if (err instanceof AssetError) {
      return {
        font: createFallbackFont(size),
        warning: `${err.message}. Using builtin fallback font.`,
      };
    }
    throw err;
  }
}
