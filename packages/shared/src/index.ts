// ============================================
// Shellmark Shared Types
// ============================================

// Error codes
export { ErrorCode } from "./errors/index.js";
// Result type (shared so core and cli agree on one shape)
export type { Result } from "./types/result.js";
export { Err, flatMap, mapErr, Ok, tryCatch } from "./types/result.js";
// Styles
export type { BaseColor, Color, Style, StyleModifier } from "./style/index.js";
export {
  isEmptyStyle,
  mergeStyles,
  paint,
  parseColor,
  parseStyleString,
  STYLE_MODIFIERS,
  StyleParseError,
  stylePainter,
} from "./style/index.js";
