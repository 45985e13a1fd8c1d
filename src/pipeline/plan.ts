/**
 * Card planning: resolve every element of a card to pixel geometry.
 *
 * Nothing here touches pixels. The renderer paints the plan as-is and never
 * re-derives a sizing decision.
 */

import type {
  CardRequest,
  Label,
  LayoutBox,
  PackingResult,
  Point,
  PositionedLine,
  Rgba,
} from "../contracts";
import type { Font } from "../fonts";
import {
  centerTextInPill,
  packLabels,
  placePillBeside,
  positionLines,
  wrapText,
  ELLIPSIS,
} from "../layout";
import type { Rng } from "../lib/random";
import {
  createEngineConfig,
  pillColor,
  type CardTemplate,
  type EngineConfig,
  type SceneDefinition,
  type TextElement,
} from "../scenes";

export type CardFonts = Record<TextElement, Font>;

/** A run of text; `y` is the top of the text, not the baseline. */
export interface TextRun {
  text: string;
  x: number;
  y: number;
  font: Font;
  color: Rgba;
  tracking: number;
}

export interface PlannedPill {
  box: LayoutBox;
  fill: Rgba;
  label: TextRun;
}

export interface CardPlan {
  width: number;
  height: number;
  engine: EngineConfig;
  texts: TextRun[];
  pills: PlannedPill[];
  radioLines: PositionedLine[];
  packing: PackingResult;
}

/**
 * Labels handed to the packer.
 *
 * fixed-slot: the tags, in order. greedy-flow: tags, verbatims, artists and
 * the scene name, each coloured by category.
 */
export function buildLabels(request: CardRequest): Label[] {
  if (request.policy === "fixed-slot") {
    return request.tags.map((text): Label => ({ category: "tag", text, backgroundStyle: "neutral" }));
  }
  return [
    ...request.tags.map((text): Label => ({ category: "tag", text, backgroundStyle: "categorical" })),
    ...request.verbatims.map((text): Label => ({
      category: "verbatim",
      text,
      backgroundStyle: "categorical",
    })),
    ...request.artists.map((text): Label => ({
      category: "artist",
      text,
      backgroundStyle: "categorical",
    })),
    { category: "sceneName", text: request.sceneName, backgroundStyle: "categorical" },
  ];
}

function centeredLabel(text: string, font: Font, box: LayoutBox, color: Rgba): TextRun {
  const origin: Point = centerTextInPill(text, font, box);
  return { text, x: origin.x, y: origin.y, font, color, tracking: 0 };
}

/**
 * Plan a card on a canvas of `width` x `height` pixels.
 */
export function planCard(
  request: CardRequest,
  canvas: { width: number; height: number },
  fonts: CardFonts,
  scene: SceneDefinition,
  template: CardTemplate,
  rng: Rng
): CardPlan {
  const engine = createEngineConfig(template, canvas.width);
  const { positions, colors } = template;
  const tracking = engine.trackingByElement;

  const texts: TextRun[] = [];
  const pills: PlannedPill[] = [];

  texts.push({
    text: `${request.frequency} FM`,
    ...positions.frequency,
    font: fonts.frequency,
    color: colors.frequency,
    tracking: tracking.frequency,
  });

  const genreText = `${request.sceneGenre} dans`;
  texts.push({
    text: genreText,
    ...positions.sceneGenre,
    font: fonts.sceneGenre,
    color: colors.sceneGenre,
    tracking: tracking.sceneGenre,
  });

  const scenePillBox = placePillBeside(
    genreText,
    fonts.sceneGenre,
    positions.sceneGenre,
    request.sceneName,
    fonts.sceneName,
    { ...template.sceneNamePill, referenceTracking: tracking.sceneGenre }
  );
  pills.push({
    box: scenePillBox,
    fill: scene.palette.accent,
    label: centeredLabel(request.sceneName, fonts.sceneName, scenePillBox, colors.pillText),
  });

  if (request.dateLine !== null) {
    texts.push({
      text: request.dateLine,
      ...positions.dateLine,
      font: fonts.dateLine,
      color: colors.dateLine,
      tracking: tracking.dateLine,
    });
  }

  const radioFont = fonts.radioStation;
  const wrapped = wrapText(request.radioStationName, radioFont, canvas.width - template.radioStation.rightInset, {
    maxLines: template.radioStation.maxLines,
    tracking: tracking.radioStation,
  });
  const radioLines = positionLines(
    wrapped,
    radioFont,
    positions.radioStation,
    template.radioStation.lineSpacing,
    tracking.radioStation
  );
  for (const line of radioLines) {
    texts.push({
      text: line.text,
      x: line.x,
      y: line.y,
      font: radioFont,
      color: colors.radioStation,
      tracking: tracking.radioStation,
    });
    if (line.ellipsisX !== null) {
      texts.push({
        text: ELLIPSIS,
        x: line.ellipsisX,
        y: line.y,
        font: radioFont,
        color: colors.radioStation,
        tracking: 0,
      });
    }
  }

  const packing = packLabels(
    request.policy,
    buildLabels(request),
    fonts.tags,
    { ...engine, origin: positions.tags },
    rng
  );
  for (const row of packing.rows) {
    for (const placed of row.labels) {
      pills.push({
        box: placed.box,
        fill: pillColor(scene.palette, placed.style, placed.label.category),
        label: centeredLabel(placed.displayText, fonts.tags, placed.box, colors.pillText),
      });
    }
  }

  return {
    width: canvas.width,
    height: canvas.height,
    engine,
    texts,
    pills,
    radioLines,
    packing,
  };
}

/**
 * JSON-friendly view of a plan (fonts reduced to family and size).
 */
export function summarizePlan(plan: CardPlan): Record<string, unknown> {
  return {
    width: plan.width,
    height: plan.height,
    engine: plan.engine,
    policy: plan.packing.policy,
    rows: plan.packing.rows.map((row) => ({
      width: row.width,
      labels: row.labels.map((l) => ({
        sourceIndex: l.sourceIndex,
        category: l.label.category,
        text: l.label.text,
        displayText: l.displayText,
        truncated: l.truncated,
        style: l.style,
        box: l.box,
      })),
    })),
    dropped: plan.packing.dropped.map((l) => l.text),
    radioLines: plan.radioLines.map((l) => ({
      text: l.text,
      x: l.x,
      y: l.y,
      width: l.width,
      ellipsisX: l.ellipsisX,
    })),
    texts: plan.texts.map((t) => ({
      text: t.text,
      x: t.x,
      y: t.y,
      font: `${t.font.family} ${t.font.size}px`,
      tracking: t.tracking,
    })),
  };
}
