export { getScene, getAvailableScenes, sceneSafeName, pillColor } from "./registry";
export type { SceneDefinition, ScenePalette } from "./registry";
export { DEFAULT_TEMPLATE, createEngineConfig } from "./template";
export type { CardTemplate, EngineConfig, FontSpec, TextElement, TrackedElement } from "./template";
