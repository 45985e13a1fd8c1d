export { textWidth, trackedGlyphPositions, drawAdvance } from "./measure";
export type { GlyphPosition } from "./measure";
export { wrapText, positionLines, ellipsizedWidth } from "./wrap";
export type { WrapOptions } from "./wrap";
export {
  ELLIPSIS,
  SLOT_FLOOR,
  FLOW_RUN,
  FLOW_FLOOR,
  shrinkOneChar,
  truncateRun,
  truncateToWidth,
} from "./truncate";
export { pillWidth, pillBox, pillHeightFor, centerTextInPill, placePillBeside } from "./pill";
export type { BesideOptions } from "./pill";
export {
  packFixedSlot,
  packGreedyFlow,
  packLabels,
  rowWidth,
  FIXED_SLOT_COUNT,
  FIXED_SLOT_ROWS,
  FIXED_SLOT_ACCENTED,
} from "./packer";
export type { PackOptions } from "./packer";
