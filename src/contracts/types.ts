/**
 * Shared contract types for the freqcard pipeline.
 *
 * Layout, render and pipeline modules import shared types from here.
 * No layout module should import types from the pipeline.
 */

// --- Scenes ---

export type SceneName = "L'Atrium" | "Le Refuge";

// --- Labels ---

export type LabelCategory = "tag" | "verbatim" | "artist" | "sceneName";

/**
 * How a pill background is resolved against the scene palette:
 * neutral = white, accent = the scene colour, categorical = per-category colour.
 */
export type BackgroundStyle = "neutral" | "accent" | "categorical";

export interface Label {
  readonly category: LabelCategory;
  readonly text: string;
  readonly backgroundStyle: BackgroundStyle;
}

export type PackingPolicy = "fixed-slot" | "greedy-flow";

// --- Geometry ---

export interface LayoutBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface PlacedLabel {
  /** Position of the label in the caller's input, before any shuffle. */
  sourceIndex: number;
  label: Label;
  /** Text actually drawn, possibly truncated with an ellipsis. */
  displayText: string;
  truncated: boolean;
  /** Resolved style; fixed-slot overrides the label's own style. */
  style: BackgroundStyle;
  box: LayoutBox;
}

export interface PackedRow {
  labels: PlacedLabel[];
  /** Sum of pill widths plus the gaps between them. */
  width: number;
}

export interface PackingResult {
  policy: PackingPolicy;
  rows: PackedRow[];
  /** Labels that did not fit within maxLines (greedy-flow only). */
  dropped: Label[];
}

// --- Wrapped text ---

export interface WrappedLine {
  words: string[];
  text: string;
  /** Measured width of `text` under the wrap's tracking. */
  width: number;
  /** Set on the last kept line when wrapping hit maxLines. */
  ellipsis: boolean;
}

export interface PositionedLine extends WrappedLine {
  x: number;
  y: number;
  /** Left edge of the untracked ellipsis, when present. */
  ellipsisX: number | null;
}

// --- Colour ---

export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

// --- Card request ---

export interface CardRequest {
  frequency: string;
  sceneGenre: string;
  sceneName: string;
  radioStationName: string;
  tags: string[];
  /** Free line under the genre, e.g. date and venue. */
  dateLine: string | null;
  policy: PackingPolicy;
  /** Extra labels used by the greedy-flow policy. */
  verbatims: string[];
  artists: string[];
  /** Overrides the configured shuffle seed for greedy-flow. */
  seed: number | null;
}

// --- Validation Result ---

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}
