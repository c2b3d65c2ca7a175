/**
 * Style Type Definitions
 *
 * A style is a plain value describing how a run of terminal text is painted.
 * It is parsed from a user style string such as `"red bold dimmed"` and only
 * turned into ANSI escapes at the very end, by {@link paint}.
 *
 * @module style
 */

// =============================================================================
// Color Types
// =============================================================================

/**
 * The eight base terminal colors, using chalk's names.
 */
export type BaseColor = "black" | "red" | "green" | "yellow" | "blue" | "magenta" | "cyan" | "white";

/**
 * A terminal color.
 *
 * Supports:
 * - Named colors, optionally bright (e.g. `red`, `bright-purple`)
 * - ANSI 256 palette indices (e.g. `214`)
 * - Hex colors (e.g. `#ff5500`)
 */
export type Color =
  | { readonly type: "named"; readonly name: BaseColor; readonly bright: boolean }
  | { readonly type: "fixed"; readonly code: number }
  | { readonly type: "hex"; readonly hex: string };

// =============================================================================
// Style
// =============================================================================

/**
 * Text attributes that can be toggled on a style.
 */
export type StyleModifier =
  | "bold"
  | "dimmed"
  | "italic"
  | "underline"
  | "inverted"
  | "hidden"
  | "strikethrough";

/**
 * A complete style value. Unset fields mean "inherit / terminal default".
 */
export interface Style {
  readonly fg?: Color;
  readonly bg?: Color;
  readonly bold?: boolean;
  readonly dimmed?: boolean;
  readonly italic?: boolean;
  readonly underline?: boolean;
  readonly inverted?: boolean;
  readonly hidden?: boolean;
  readonly strikethrough?: boolean;
}

/**
 * Modifiers in the order they are applied when painting.
 */
export const STYLE_MODIFIERS: readonly StyleModifier[] = [
  "bold",
  "dimmed",
  "italic",
  "underline",
  "inverted",
  "hidden",
  "strikethrough",
];
