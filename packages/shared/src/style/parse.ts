import { ErrorCode } from "../errors/codes.js";
import { Err, Ok, type Result } from "../types/result.js";
import { type BaseColor, type Color, STYLE_MODIFIERS, type Style, type StyleModifier } from "./types.js";

/**
 * Raised when a style string contains a word that is neither a modifier nor a color.
 */
export class StyleParseError extends Error {
  readonly code = ErrorCode.STYLE_INVALID;
  readonly word: string;

  constructor(word: string, input: string) {
    super(`Invalid style word '${word}' in '${input}'`);
    this.name = "StyleParseError";
    this.word = word;
  }
}

type MutableStyle = { -readonly [K in keyof Style]: Style[K] };

const COLOR_NAMES = new Map<string, BaseColor>([
  ["black", "black"],
  ["red", "red"],
  ["green", "green"],
  ["yellow", "yellow"],
  ["blue", "blue"],
  ["purple", "magenta"],
  ["magenta", "magenta"],
  ["cyan", "cyan"],
  ["white", "white"],
]);

const MODIFIER_WORDS = new Set<string>(STYLE_MODIFIERS);

function isModifier(word: string): word is StyleModifier {
  return MODIFIER_WORDS.has(word);
}

/**
 * Parse a single color word (`red`, `bright-blue`, `#ff8800`, `208`).
 *
 * @returns The color, or undefined when the word is not a color
 */
export function parseColor(word: string): Color | undefined {
  const lower = word.toLowerCase();

  if (/^#[0-9a-f]{6}$/.test(lower)) {
    return { type: "hex", hex: lower };
  }

  if (/^\d{1,3}$/.test(lower)) {
    const code = Number.parseInt(lower, 10);
    return code <= 255 ? { type: "fixed", code } : undefined;
  }

  const bright = lower.startsWith("bright-");
  const name = COLOR_NAMES.get(bright ? lower.slice("bright-".length) : lower);
  return name ? { type: "named", name, bright } : undefined;
}

/**
 * Parse a whitespace separated style string into a {@link Style}.
 *
 * Words are case-insensitive and applied left to right, so later words win:
 * - modifiers: `bold`, `dimmed`, `italic`, `underline`, `inverted`, `hidden`, `strikethrough`
 * - `fg:<color>` / `bg:<color>`, or a bare `<color>` for the foreground
 * - `none` clears everything parsed so far
 *
 * @example
 * ```typescript
 * parseStyleString("red bold dimmed");
 * // Ok({ bold: true, dimmed: true, fg: { type: "named", name: "red", bright: false } })
 * ```
 */
export function parseStyleString(input: string): Result<Style, StyleParseError> {
  let style: MutableStyle = {};

  for (const word of input.split(/\s+/).filter((w) => w.length > 0)) {
    const lower = word.toLowerCase();

    if (lower === "none") {
      style = {};
      continue;
    }

    if (isModifier(lower)) {
      style[lower] = true;
      continue;
    }

    const isBackground = lower.startsWith("bg:");
    const colorWord = isBackground || lower.startsWith("fg:") ? lower.slice(3) : lower;
    const color = parseColor(colorWord);
    if (!color) {
      return Err(new StyleParseError(word, input));
    }

    if (isBackground) {
      style.bg = color;
    } else {
      style.fg = color;
    }
  }

  return Ok(style);
}

/**
 * Layer `override` on top of `base`, field by field.
 */
export function mergeStyles(base: Style | undefined, override: Style | undefined): Style {
  const merged: MutableStyle = { ...base };
  if (override) {
    for (const [key, value] of Object.entries(override)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }
  return merged;
}

/**
 * Whether a style sets nothing at all.
 */
export function isEmptyStyle(style: Style | undefined): boolean {
  return style === undefined || Object.values(style).every((value) => value === undefined);
}
