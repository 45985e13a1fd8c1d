/**
 * The card template: where each element goes on the background, which font
 * it uses, and the pill-engine parameters.
 *
 * Every scene shares this template; only the palette differs per scene.
 */

import type { Point, Rgba } from "../contracts";

export type TextElement =
  | "frequency"
  | "sceneGenre"
  | "sceneName"
  | "dateLine"
  | "radioStation"
  | "tags";

/** Plain text elements; pill text is always drawn untracked. */
export type TrackedElement = "frequency" | "sceneGenre" | "dateLine" | "radioStation";

export interface FontSpec {
  /** OpenType file name, relative to `<assets>/fonts`. */
  file: string;
  size: number;
  /** Pixels; defaults to DEFAULT_BASELINE_CORRECTION. */
  baselineCorrection?: number;
}

/** Parameters of the pill packing engine for one canvas. */
export interface EngineConfig {
  paddingX: number;
  paddingY: number;
  pillHeight: number;
  gapX: number;
  gapY: number;
  rowMaxWidth: number;
  maxLines: number;
  /** Extra spacing between characters, per element; 0 = untracked. */
  trackingByElement: Record<TrackedElement, number>;
}

export interface CardTemplate {
  /** Left and right margin of the content column. */
  margin: number;
  fonts: Record<TextElement, FontSpec>;
  colors: {
    frequency: Rgba;
    sceneGenre: Rgba;
    dateLine: Rgba;
    radioStation: Rgba;
    /** Text inside every pill. */
    pillText: Rgba;
  };
  positions: {
    frequency: Point;
    sceneGenre: Point;
    dateLine: Point;
    radioStation: Point;
    tags: Point;
  };
  sceneNamePill: {
    gap: number;
    offset: Point;
    paddingX: number;
    paddingY: number;
  };
  radioStation: {
    /** Wrap width is the canvas width minus this inset. */
    rightInset: number;
    lineSpacing: number;
    maxLines: number;
  };
  pills: {
    paddingX: number;
    paddingY: number;
    gapX: number;
    gapY: number;
    maxLines: number;
  };
  trackingByElement: Record<TrackedElement, number>;
}

const WHITE: Rgba = { r: 255, g: 255, b: 255, a: 255 };
const BLACK: Rgba = { r: 0, g: 0, b: 0, a: 255 };
const SLATE: Rgba = { r: 31, g: 41, b: 55, a: 255 };

export const DEFAULT_TEMPLATE: CardTemplate = {
  margin: 66,
  fonts: {
    frequency: { file: "Obviously-MediumItalic.otf", size: 174 },
    sceneGenre: { file: "DarkerGrotesque-SemiBold.ttf", size: 60 },
    sceneName: { file: "DarkerGrotesque-ExtraBold.ttf", size: 54 },
    dateLine: { file: "DarkerGrotesque-ExtraBold.ttf", size: 80 },
    radioStation: { file: "Obviously-MediumItalic.otf", size: 127 },
    tags: { file: "DarkerGrotesque-ExtraBold.ttf", size: 42 },
  },
  colors: {
    frequency: WHITE,
    sceneGenre: BLACK,
    dateLine: BLACK,
    radioStation: WHITE,
    pillText: SLATE,
  },
  positions: {
    frequency: { x: 66, y: 311 },
    sceneGenre: { x: 66, y: 460 },
    dateLine: { x: 66, y: 520 },
    radioStation: { x: 66, y: 800 },
    tags: { x: 66, y: 1300 },
  },
  sceneNamePill: {
    gap: 24,
    offset: { x: 0, y: 30 },
    paddingX: 30,
    paddingY: 15,
  },
  radioStation: {
    rightInset: 200,
    lineSpacing: 8,
    maxLines: 3,
  },
  pills: {
    paddingX: 30,
    paddingY: 15,
    gapX: 24,
    gapY: 24,
    maxLines: 3,
  },
  trackingByElement: {
    frequency: -8,
    sceneGenre: 0,
    dateLine: 0,
    radioStation: -8,
  },
};

/**
 * Resolve the engine parameters for a canvas of the given width.
 * Rows span the canvas between the two margins; the row pitch follows the
 * tag font size.
 */
export function createEngineConfig(template: CardTemplate, canvasWidth: number): EngineConfig {
  const { paddingX, paddingY, gapX, gapY, maxLines } = template.pills;
  return {
    paddingX,
    paddingY,
    pillHeight: template.fonts.tags.size + 2 * paddingY,
    gapX,
    gapY,
    rowMaxWidth: canvasWidth - 2 * template.margin,
    maxLines,
    trackingByElement: { ...template.trackingByElement },
  };
}
