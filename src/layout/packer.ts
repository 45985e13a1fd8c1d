import type { Font } from "../fonts";
import type {
  BackgroundStyle,
  Label,
  PackedRow,
  PackingPolicy,
  PackingResult,
  PlacedLabel,
  Point,
} from "../contracts";
import { ConfigurationError } from "../lib/errors";
import { seededShuffle, type Rng } from "../lib/random";
import { pillWidth } from "./pill";
import { SLOT_FLOOR, shrinkOneChar, truncateRun, truncateToWidth } from "./truncate";

export interface PackOptions {
  paddingX: number;
  pillHeight: number;
  gapX: number;
  gapY: number;
  rowMaxWidth: number;
  maxLines: number;
  /** Top-left of the first row. */
  origin: Point;
}

// --- Fixed-slot constants ---

export const FIXED_SLOT_COUNT = 5;
/** Label indices per row. */
export const FIXED_SLOT_ROWS: readonly (readonly number[])[] = [[0, 1], [2, 3], [4]];
/** Labels at these indices are drawn with the accent background. */
export const FIXED_SLOT_ACCENTED: ReadonlySet<number> = new Set([1, 2]);

// --- Helpers ---

/** Sum of pill widths plus `gapX` between consecutive pills. */
export function rowWidth(widths: number[], gapX: number): number {
  if (widths.length === 0) return 0;
  return widths.reduce((sum, w) => sum + w, 0) + gapX * (widths.length - 1);
}

function charCount(text: string): number {
  return Array.from(text).length;
}

function rowTop(options: PackOptions, rowIndex: number): number {
  return options.origin.y + rowIndex * (options.pillHeight + options.gapY);
}

interface Slot {
  sourceIndex: number;
  label: Label;
  displayText: string;
  style: BackgroundStyle;
}

/** Lay slots out left to right on one row. */
function placeRow(slots: Slot[], font: Font, options: PackOptions, rowIndex: number): PackedRow {
  const y = rowTop(options, rowIndex);
  let x = options.origin.x;
  const labels: PlacedLabel[] = [];
  for (const slot of slots) {
    const width = pillWidth(slot.displayText, font, options.paddingX);
    labels.push({
      sourceIndex: slot.sourceIndex,
      label: slot.label,
      displayText: slot.displayText,
      truncated: slot.displayText !== slot.label.text,
      style: slot.style,
      box: { x, y, width, height: options.pillHeight },
    });
    x += width + options.gapX;
  }
  return {
    labels,
    width: rowWidth(
      labels.map((l) => l.box.width),
      options.gapX
    ),
  };
}

// --- Fixed-slot policy ---

/**
 * Shrink the wider of two labels (the first on ties) until the pair fits
 * `available`. When the wider one is at the floor, shrink the other instead.
 */
function fitPair(
  first: string,
  second: string,
  font: Font,
  options: PackOptions,
  available: number
): [string, string] {
  let a = first;
  let b = second;
  for (;;) {
    const wa = pillWidth(a, font, options.paddingX);
    const wb = pillWidth(b, font, options.paddingX);
    if (wa + options.gapX + wb <= available) break;

    const canA = charCount(a) > SLOT_FLOOR;
    const canB = charCount(b) > SLOT_FLOOR;
    const shrinkA = wa >= wb ? canA : canA && !canB;
    if (shrinkA) {
      a = shrinkOneChar(a);
    } else if (canB) {
      b = shrinkOneChar(b);
    } else {
      break;
    }
  }
  return [a, b];
}

function fitSingle(text: string, font: Font, options: PackOptions, available: number): string {
  let current = text;
  while (
    pillWidth(current, font, options.paddingX) > available &&
    charCount(current) > SLOT_FLOOR
  ) {
    current = shrinkOneChar(current);
  }
  return current;
}

/**
 * Exactly five labels in rows of [2, 2, 1]. Labels 2 and 3 (1-indexed) get
 * the accent background, the rest neutral, whatever their own style says.
 * Overflow is resolved after placement by shrinking labels on the row.
 */
export function packFixedSlot(labels: Label[], font: Font, options: PackOptions): PackingResult {
  if (labels.length !== FIXED_SLOT_COUNT) {
    throw new ConfigurationError(
      `Fixed-slot packing requires exactly ${FIXED_SLOT_COUNT} labels, got ${labels.length}.`
    );
  }

  const rows = FIXED_SLOT_ROWS.map((indices, rowIndex) => {
    const texts = indices.map((i) => labels[i].text);
    const fitted =
      texts.length === 2
        ? fitPair(texts[0], texts[1], font, options, options.rowMaxWidth)
        : [fitSingle(texts[0], font, options, options.rowMaxWidth)];

    const slots: Slot[] = indices.map((sourceIndex, k) => ({
      sourceIndex,
      label: labels[sourceIndex],
      displayText: fitted[k],
      style: FIXED_SLOT_ACCENTED.has(sourceIndex) ? "accent" : "neutral",
    }));
    return placeRow(slots, font, options, rowIndex);
  });

  return { policy: "fixed-slot", rows, dropped: [] };
}

// --- Greedy-flow policy ---

/**
 * Shuffle the labels with `rng`, then flow them left to right.
 *
 * Each label is truncated on its own before placement so that its pill fits
 * `rowMaxWidth`. A label that does not fit the current row opens a new one;
 * once `maxLines` rows exist, that label and all after it are dropped.
 */
export function packGreedyFlow(
  labels: Label[],
  font: Font,
  options: PackOptions,
  rng: Rng
): PackingResult {
  const order = seededShuffle(
    labels.map((label, sourceIndex) => ({ label, sourceIndex })),
    rng
  );

  const rowSlots: Slot[][] = [];
  let currentWidth = 0;
  const dropped: Label[] = [];

  for (let i = 0; i < order.length; i++) {
    const { label, sourceIndex } = order[i];
    const displayText = truncateToWidth(
      label.text,
      font,
      options.rowMaxWidth - 2 * options.paddingX,
      truncateRun
    );
    const width = pillWidth(displayText, font, options.paddingX);
    const slot: Slot = { sourceIndex, label, displayText, style: label.backgroundStyle };

    const current = rowSlots[rowSlots.length - 1];
    if (current !== undefined && currentWidth + options.gapX + width <= options.rowMaxWidth) {
      current.push(slot);
      currentWidth += options.gapX + width;
      continue;
    }
    if (rowSlots.length >= options.maxLines) {
      dropped.push(...order.slice(i).map((entry) => entry.label));
      break;
    }
    rowSlots.push([slot]);
    currentWidth = width;
  }

  return {
    policy: "greedy-flow",
    rows: rowSlots.map((slots, rowIndex) => placeRow(slots, font, options, rowIndex)),
    dropped,
  };
}

/**
 * Pack labels under the given policy. `rng` is only consulted by greedy-flow.
 */
export function packLabels(
  policy: PackingPolicy,
  labels: Label[],
  font: Font,
  options: PackOptions,
  rng: Rng
): PackingResult {
  if (policy === "fixed-slot") {
    return packFixedSlot(labels, font, options);
  }
  return packGreedyFlow(labels, font, options, rng);
}
