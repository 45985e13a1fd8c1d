import type { Font } from "../fonts";
import type { LayoutBox, Point } from "../contracts";
import { textWidth } from "./measure";

/**
 * Pill width: measured text width plus horizontal padding on both sides.
 */
export function pillWidth(text: string, font: Font, paddingX: number): number {
  return textWidth(text, font) + 2 * paddingX;
}

/** Natural pill height for a font: ascent + descent plus vertical padding. */
export function pillHeightFor(font: Font, paddingY: number): number {
  return font.ascent + font.descent + 2 * paddingY;
}

export function pillBox(
  text: string,
  font: Font,
  paddingX: number,
  pillHeight: number,
  origin: Point = { x: 0, y: 0 }
): LayoutBox {
  return {
    x: origin.x,
    y: origin.y,
    width: pillWidth(text, font, paddingX),
    height: pillHeight,
  };
}

/**
 * Where to draw `text` so it sits visually centred in `box`.
 *
 * Horizontal centering uses the inked bounding box, shifted left by the first
 * glyph's side bearing. Vertical centering uses ascent/descent; `y` is the
 * text top (baseline = y + ascent) and includes the font's baseline correction.
 */
export function centerTextInPill(text: string, font: Font, box: LayoutBox): Point {
  const inkWidth = textWidth(text, font);
  const textHeight = font.ascent + font.descent;
  return {
    x: box.x + (box.width - inkWidth) / 2 - font.leftBearing(text),
    y: box.y + (box.height - textHeight) / 2 + font.baselineCorrection,
  };
}

export interface BesideOptions {
  /** Horizontal gap between the reference text and the pill. */
  gap: number;
  /** Added to the final position. */
  offset: Point;
  paddingX: number;
  paddingY: number;
  /** Tracking the reference text is drawn with. */
  referenceTracking?: number;
}

/**
 * Box for a pill placed right of a reference text, vertically centred on it.
 */
export function placePillBeside(
  referenceText: string,
  referenceFont: Font,
  referenceOrigin: Point,
  text: string,
  font: Font,
  options: BesideOptions
): LayoutBox {
  const height = pillHeightFor(font, options.paddingY);
  const referenceHeight = referenceFont.ascent + referenceFont.descent;
  return {
    x:
      referenceOrigin.x +
      textWidth(referenceText, referenceFont, options.referenceTracking ?? 0) +
      options.gap +
      options.offset.x,
    y:
      referenceOrigin.y +
      Math.floor((referenceHeight - height) / 2) +
      options.offset.y,
    width: pillWidth(text, font, options.paddingX),
    height,
  };
}
