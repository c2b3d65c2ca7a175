export { paint, stylePainter } from "./paint.js";
export { isEmptyStyle, mergeStyles, parseColor, parseStyleString, StyleParseError } from "./parse.js";
export type { BaseColor, Color, Style, StyleModifier } from "./types.js";
export { STYLE_MODIFIERS } from "./types.js";
