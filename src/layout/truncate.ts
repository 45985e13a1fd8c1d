import type { Font } from "../fonts";
import { textWidth } from "./measure";

export const ELLIPSIS = "...";

/** Shortest label the fixed-slot shrink step will produce, in characters. */
export const SLOT_FLOOR = 3;

/** Characters replaced per greedy-flow truncation step. */
export const FLOW_RUN = 4;
/** Shortest label the greedy-flow step will produce: one character plus the ellipsis. */
export const FLOW_FLOOR = FLOW_RUN;

/**
 * Fixed-slot shrink step: drop one trailing character, then, if the text is
 * still above the floor, replace its last three characters with an ellipsis.
 * Text at or below the floor is returned unchanged.
 *
 * "Hypnotique" -> "Hypnot..." -> "Hypno..."
 */
export function shrinkOneChar(text: string): string {
  const chars = Array.from(text);
  if (chars.length <= SLOT_FLOOR) return text;
  const trimmed = chars.slice(0, -1);
  if (trimmed.length <= SLOT_FLOOR) return trimmed.join("");
  return trimmed.slice(0, -ELLIPSIS.length).join("") + ELLIPSIS;
}

/**
 * Greedy-flow step: replace the trailing run of FLOW_RUN characters with an
 * ellipsis. Each step shortens the text by one character. Text at or below
 * the floor is returned unchanged.
 *
 * "Reiner Zonneveld" -> "Reiner Zonne..." -> "Reiner Zonn..."
 */
export function truncateRun(text: string): string {
  const chars = Array.from(text);
  if (chars.length <= FLOW_FLOOR) return text;
  return chars.slice(0, -FLOW_RUN).join("") + ELLIPSIS;
}

/**
 * Apply `step` until `text` measures at most `maxWidth` or stops shrinking.
 */
export function truncateToWidth(
  text: string,
  font: Font,
  maxWidth: number,
  step: (text: string) => string
): string {
  let current = text;
  while (textWidth(current, font) > maxWidth) {
    const next = step(current);
    if (next === current) break;
    current = next;
  }
  return current;
}
