export type { Font } from "./types";
export { createFallbackFont } from "./fallback";
export {
  fontFromOpenType,
  loadFont,
  loadFontOrFallback,
  DEFAULT_BASELINE_CORRECTION,
} from "./loadFont";
