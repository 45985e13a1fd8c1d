import type { Font } from "../fonts";
import type { Point, PositionedLine, WrappedLine } from "../contracts";
import { textWidth } from "./measure";
import { ELLIPSIS } from "./truncate";

export interface WrapOptions {
  /** Keep at most this many lines; the last kept line gets an ellipsis. */
  maxLines?: number | null;
  tracking?: number;
}

function toLine(words: string[], font: Font, tracking: number, ellipsis: boolean): WrappedLine {
  const text = words.join(" ");
  return { words, text, width: textWidth(text, font, tracking), ellipsis };
}

/**
 * Measured width of a line ending in the ellipsis: the words are tracked,
 * the ellipsis is not.
 */
export function ellipsizedWidth(words: string[], font: Font, tracking: number): number {
  return textWidth(words.join(" "), font, tracking) + textWidth(ELLIPSIS, font);
}

/**
 * Greedy word wrap.
 *
 * Words are never broken: a single word wider than `maxWidth` gets a line of
 * its own. Empty or whitespace-only input yields no lines.
 */
export function wrapText(
  text: string,
  font: Font,
  maxWidth: number,
  options: WrapOptions = {}
): WrappedLine[] {
  const tracking = options.tracking ?? 0;
  const words = text.split(/\s+/).filter((w) => w.length > 0);

  const lineWords: string[][] = [];
  let current: string[] = [];
  for (const word of words) {
    const candidate = [...current, word];
    if (textWidth(candidate.join(" "), font, tracking) <= maxWidth) {
      current = candidate;
    } else if (current.length > 0) {
      lineWords.push(current);
      current = [word];
    } else {
      lineWords.push([word]);
    }
  }
  if (current.length > 0) {
    lineWords.push(current);
  }

  const maxLines = options.maxLines ?? null;
  if (maxLines === null || lineWords.length <= maxLines) {
    return lineWords.map((w) => toLine(w, font, tracking, false));
  }
  if (maxLines <= 0) return [];

  const kept = lineWords.slice(0, maxLines);
  const last = [...kept[kept.length - 1]];
  while (last.length > 1 && ellipsizedWidth(last, font, tracking) > maxWidth) {
    last.pop();
  }
  kept[kept.length - 1] = last;

  return kept.map((w, i) => toLine(w, font, tracking, i === kept.length - 1));
}

/**
 * Place wrapped lines top-down from `origin`, one every
 * `font.size + lineSpacing` pixels.
 *
 * The ellipsis goes right after the measured width of its line. An untracked
 * line is measured on its ink, which starts one left bearing past the pen.
 */
export function positionLines(
  lines: WrappedLine[],
  font: Font,
  origin: Point,
  lineSpacing: number,
  tracking = 0
): PositionedLine[] {
  return lines.map((line, i) => {
    const inkStart = tracking === 0 ? font.leftBearing(line.text) : 0;
    return {
      ...line,
      x: origin.x,
      y: origin.y + i * (font.size + lineSpacing),
      ellipsisX: line.ellipsis ? origin.x + inkStart + line.width : null,
    };
  });
}
