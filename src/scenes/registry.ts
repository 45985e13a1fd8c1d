/**
 * Scene registry: maps scene names to their background and palette.
 *
 * Adding a scene:
 * 1. Drop its background into the assets directory
 * 2. Register it here
 */

import type { BackgroundStyle, LabelCategory, Rgba, SceneName } from "../contracts";
import { ConfigurationError } from "../lib/errors";

export interface ScenePalette {
  /** Background of distinguished pills. */
  accent: Rgba;
  neutral: Rgba;
  /** Used for categorical pills (greedy-flow). */
  categories: Record<LabelCategory, Rgba>;
}

export interface SceneDefinition {
  name: SceneName;
  /** File name of the background, relative to the assets directory. */
  background: string;
  palette: ScenePalette;
}

const WHITE_PILL: Rgba = { r: 255, g: 255, b: 255, a: 220 };

const ORANGE: Rgba = { r: 255, g: 134, b: 53, a: 255 };
const LAVENDER: Rgba = { r: 182, g: 140, b: 254, a: 220 };

const ATRIUM: SceneDefinition = {
  name: "L'Atrium",
  background: "orange.png",
  palette: {
    accent: ORANGE,
    neutral: WHITE_PILL,
    categories: {
      tag: WHITE_PILL,
      verbatim: { r: 255, g: 214, b: 170, a: 235 },
      artist: ORANGE,
      sceneName: { r: 255, g: 236, b: 200, a: 255 },
    },
  },
};

const REFUGE: SceneDefinition = {
  name: "Le Refuge",
  background: "purple.png",
  palette: {
    accent: LAVENDER,
    neutral: WHITE_PILL,
    categories: {
      tag: WHITE_PILL,
      verbatim: { r: 222, g: 204, b: 255, a: 235 },
      artist: LAVENDER,
      sceneName: { r: 240, g: 232, b: 255, a: 255 },
    },
  },
};

const REGISTRY: readonly SceneDefinition[] = [ATRIUM, REFUGE];

/**
 * Look up a scene by name, ignoring case.
 * Throws ConfigurationError for any other name.
 */
export function getScene(name: string): SceneDefinition {
  const scene = REGISTRY.find((s) => s.name.toLowerCase() === name.trim().toLowerCase());
  if (!scene) {
    const available = REGISTRY.map((s) => `"${s.name}"`).join(", ");
    throw new ConfigurationError(`Unknown scene "${name}". Available: ${available}`);
  }
  return scene;
}

export function getAvailableScenes(): SceneName[] {
  return REGISTRY.map((s) => s.name);
}

/** "L'Atrium" -> "latrium", "Le Refuge" -> "le_refuge" */
export function sceneSafeName(name: string): string {
  return name.toLowerCase().replace(/'/g, "").replace(/ /g, "_");
}

export function pillColor(
  palette: ScenePalette,
  style: BackgroundStyle,
  category: LabelCategory
): Rgba {
  switch (style) {
    case "accent":
      return palette.accent;
    case "categorical":
      return palette.categories[category];
    case "neutral":
      return palette.neutral;
  }
}
