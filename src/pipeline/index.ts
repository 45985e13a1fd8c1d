export { parseCardRequest, validateCardFile, readCardRequest, isPackingPolicy, VALID_POLICIES } from "./request";
export { planCard, buildLabels, summarizePlan } from "./plan";
export type { CardFonts, CardPlan, PlannedPill, TextRun } from "./plan";
export {
  loadCardFonts,
  readBackground,
  prepareCard,
  renderCard,
  generateCard,
  defaultOutputPath,
} from "./generate";
export type { GenerateOptions, PreparedCard } from "./generate";
