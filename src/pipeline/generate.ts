import * as fs from "fs";
import * as path from "path";
import sharp from "sharp";
import type { CardRequest } from "../contracts";
import { loadFontOrFallback } from "../fonts";
import { AssetError } from "../lib/errors";
import { createRng } from "../lib/random";
import { createCardSvg } from "../render/svg";
import {
  DEFAULT_TEMPLATE,
  getScene,
  sceneSafeName,
  type CardTemplate,
  type SceneDefinition,
  type TextElement,
} from "../scenes";
import { planCard, type CardFonts, type CardPlan } from "./plan";

// Explicit PNG output settings for deterministic output across environments.
const PNG_OUTPUT_OPTIONS: sharp.PngOptions = {
  compressionLevel: 9,
  adaptiveFiltering: false,
  palette: false,
};

export interface GenerateOptions {
  assetsDir: string;
  /** Greedy-flow shuffle seed, unless the request carries its own. */
  seed: number;
  template?: CardTemplate;
}

export interface PreparedCard {
  backgroundPath: string;
  plan: CardPlan;
  /** Font fallbacks and other non-fatal problems. */
  warnings: string[];
}

/**
 * Load every template font from `<assetsDir>/fonts`, falling back to the
 * builtin font where a file cannot be loaded.
 */
export function loadCardFonts(
  assetsDir: string,
  template: CardTemplate
): { fonts: CardFonts; warnings: string[] } {
  const warnings: string[] = [];
  const load = (element: TextElement) => {
    const spec = template.fonts[element];
    const { font, warning } = loadFontOrFallback(
      path.join(assetsDir, "fonts", spec.file),
      spec.size,
      spec.baselineCorrection
    );
    if (warning !== null) warnings.push(`${element}: ${warning}`);
    return font;
  };

  const fonts: CardFonts = {
    frequency: load("frequency"),
    sceneGenre: load("sceneGenre"),
    sceneName: load("sceneName"),
    dateLine: load("dateLine"),
    radioStation: load("radioStation"),
    tags: load("tags"),
  };
  return { fonts, warnings };
}

/**
 * Resolve the scene background and read its dimensions.
 * A missing or unreadable background aborts the generation.
 */
export async function readBackground(
  scene: SceneDefinition,
  assetsDir: string
): Promise<{ path: string; width: number; height: number }> {
  const backgroundPath = path.join(assetsDir, scene.background);
  if (!fs.existsSync(backgroundPath)) {
    throw new AssetError(`Background image not found: ${backgroundPath}`, backgroundPath);
  }

  let meta: sharp.Metadata;
  try {
    meta = await sharp(backgroundPath).metadata();
  } catch (err) {
    throw new AssetError(
      `Cannot read background image ${backgroundPath}: ${err instanceof Error ? err.message : String(err)}`,
      backgroundPath
    );
  }
  if (!meta.width || !meta.height) {
    throw new AssetError(`Cannot read dimensions from background image: ${backgroundPath}`, backgroundPath);
  }
  return { path: backgroundPath, width: meta.width, height: meta.height };
}

/**
 * Everything up to pixels: scene lookup, background dimensions, fonts, plan.
 */
export async function prepareCard(
  request: CardRequest,
  options: GenerateOptions
): Promise<PreparedCard> {
  const template = options.template ?? DEFAULT_TEMPLATE;
  const scene = getScene(request.sceneName);
  const background = await readBackground(scene, options.assetsDir);
  const { fonts, warnings } = loadCardFonts(options.assetsDir, template);

  const rng = createRng(request.seed ?? options.seed);
  const plan = planCard(request, background, fonts, scene, template, rng);

  if (plan.packing.dropped.length > 0) {
    warnings.push(
      `${plan.packing.dropped.length} label(s) did not fit in ${plan.engine.maxLines} rows and were dropped.`
    );
  }

  return { backgroundPath: background.path, plan, warnings };
}

/**
 * Render a card to an encoded PNG buffer.
 */
export async function renderCard(
  request: CardRequest,
  options: GenerateOptions
): Promise<{ png: Buffer; plan: CardPlan; warnings: string[] }> {
  const { backgroundPath, plan, warnings } = await prepareCard(request, options);

  const png = await sharp(backgroundPath)
    .composite([{ input: createCardSvg(plan), top: 0, left: 0 }])
    .png(PNG_OUTPUT_OPTIONS)
    .toBuffer();

  return { png, plan, warnings };
}

/** Default output file for a scene: output_<scene_safe_name>.png */
export function defaultOutputPath(sceneName: string, outputDir: string): string {
  return path.join(outputDir, `output_${sceneSafeName(sceneName)}.png`);
}

/**
 * Render a card and write it to `outputPath`. Returns the written path.
 */
export async function generateCard(
  request: CardRequest,
  options: GenerateOptions & { outputPath: string }
): Promise<{ outputPath: string; plan: CardPlan; warnings: string[] }> {
  const { png, plan, warnings } = await renderCard(request, options);
  fs.mkdirSync(path.dirname(options.outputPath), { recursive: true });
  fs.writeFileSync(options.outputPath, png);
  return { outputPath: options.outputPath, plan, warnings };
}
