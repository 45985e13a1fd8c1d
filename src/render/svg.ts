/**
 * SVG overlay for a planned card.
 *
 * The overlay has the canvas dimensions and is composited at (0, 0) on the
 * scene background. Every coordinate comes from the plan.
 */

import type { Rgba } from "../contracts";
import { trackedGlyphPositions } from "../layout";
import type { CardPlan, PlannedPill, TextRun } from "../pipeline/plan";

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** Round to 2 decimals and drop trailing zeros. */
function px(value: number): string {
  return String(Math.round(value * 100) / 100);
}

export function rgbaToCss(color: Rgba): string {
  return `rgba(${color.r},${color.g},${color.b},${px(color.a / 255)})`;
}

function textElement(text: string, x: number, baseline: number, run: TextRun): string {
  return (
    `<text x="${px(x)}" y="${px(baseline)}" ` +
    `font-family="${escapeXml(run.font.family)}" font-size="${px(run.font.size)}" ` +
    `fill="${rgbaToCss(run.color)}" xml:space="preserve">${escapeXml(text)}</text>`
  );
}

/**
 * Glyph outlines from the font that measured the text, so the painted ink
 * matches the layout. Fonts without outlines fall back to a <text> element.
 */
function drawText(text: string, x: number, baseline: number, run: TextRun): string {
  const d = run.font.outline(text, x, baseline);
  if (d === null) return textElement(text, x, baseline, run);
  if (d.length === 0) return "";
  return `<path d="${d}" fill="${rgbaToCss(run.color)}" />`;
}

/**
 * Untracked runs are drawn in one piece; tracked runs glyph by glyph,
 * placed by the tracked draw cursor.
 */
export function renderTextRun(run: TextRun): string {
  const baseline = run.y + run.font.ascent;
  if (run.tracking === 0) {
    return drawText(run.text, run.x, baseline, run);
  }
  return trackedGlyphPositions(run.text, run.font, run.x, run.tracking)
    .filter((glyph) => glyph.char.trim().length > 0)
    .map((glyph) => drawText(glyph.char, glyph.x, baseline, run))
    .filter((element) => element.length > 0)
    .join("\n  ");
}

export function renderPill(pill: PlannedPill): string {
  const { x, y, width, height } = pill.box;
  const radius = height / 2;
  const label = renderTextRun(pill.label);
  return [
    `<rect x="${px(x)}" y="${px(y)}" width="${px(width)}" height="${px(height)}" ` +
      `rx="${px(radius)}" ry="${px(radius)}" fill="${rgbaToCss(pill.fill)}" />`,
    label,
  ]
    .filter((element) => element.length > 0)
    .join("\n  ");
}

/**
 * Build the overlay SVG for `plan`. Returns a Buffer ready for sharp.
 */
export function createCardSvg(plan: CardPlan): Buffer {
  const body = [...plan.texts.map(renderTextRun), ...plan.pills.map(renderPill)]
    .filter((element) => element.length > 0)
    .join("\n  ");

  const svg = `
<svg width="${plan.width}" height="${plan.height}" xmlns="http://www.w3.org/2000/svg">
  ${body}
</svg>`;

  return Buffer.from(svg);
}
