/**
 * Font metrics consumed by the layout engine.
 *
 * A Font is already scaled to a pixel size; every value it returns is in pixels.
 * Fonts are immutable once loaded.
 */
export interface Font {
  /** Family name; the renderer uses it only when the font has no outlines. */
  readonly family: string;
  /** Pixel size the font was loaded at. */
  readonly size: number;
  readonly ascent: number;
  /** Positive distance below the baseline. */
  readonly descent: number;
  readonly lineHeight: number;
  /**
   * Extra downward shift applied when vertically centering text in a pill.
   * Calibrated per font; not part of the layout contract.
   */
  readonly baselineCorrection: number;
  advanceWidth(char: string): number;
  /** Inked width of the whole string, kerning included. */
  boundingBoxWidth(text: string): number;
  /** Distance from the pen position to the first inked pixel of `text`. */
  leftBearing(text: string): number;
  /**
   * SVG path data for `text` drawn with its pen at `x` on `baseline`,
   * or null when the font carries no outlines.
   */
  outline(text: string, x: number, baseline: number): string | null;
}
