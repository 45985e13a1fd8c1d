import type { Font } from "./types";

// Conservative width estimates for a generic sans-serif, as fractions of the em.
// Overestimate slightly so pills sized with the fallback never clip their text.
const NARROW_CHARS = new Set(Array.from(" ilIj.,;:!'|`()[]"));
const WIDE_CHARS = new Set(Array.from("mwMW@"));
const NARROW_RATIO = 0.3;
const WIDE_RATIO = 0.88;
const UPPER_RATIO = 0.7;
const DEFAULT_RATIO = 0.58;

function widthRatio(char: string): number {
  if (NARROW_CHARS.has(char)) return NARROW_RATIO;
  if (WIDE_CHARS.has(char)) return WIDE_RATIO;
  if (char !== char.toLowerCase()) return UPPER_RATIO;
  return DEFAULT_RATIO;
}

/**
 * Builtin font used when a font file cannot be loaded. It has no outlines,
 * so the renderer draws its text with the host's sans-serif.
 */
export function createFallbackFont(size: number): Font {
  const advanceWidth = (char: string): number => widthRatio(char) * size;

  return {
    family: "sans-serif",
    size,
    ascent: size * 0.8,
    descent: size * 0.2,
    lineHeight: size * 1.2,
    baselineCorrection: 0,
    advanceWidth,
    boundingBoxWidth: (text) =>
      Array.from(text).reduce((sum, char) => sum + advanceWidth(char), 0),
    leftBearing: () => 0,
    outline: () => null,
  };
}
