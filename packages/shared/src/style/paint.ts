import chalk, {
  type BackgroundColorName,
  type ChalkInstance,
  type ForegroundColorName,
  type ModifierName,
} from "chalk";
import type { BaseColor, Color, Style, StyleModifier } from "./types.js";
import { STYLE_MODIFIERS } from "./types.js";
import { isEmptyStyle } from "./parse.js";

const MODIFIER_METHODS: Record<StyleModifier, ModifierName> = {
  bold: "bold",
  dimmed: "dim",
  italic: "italic",
  underline: "underline",
  inverted: "inverse",
  hidden: "hidden",
  strikethrough: "strikethrough",
};

const FOREGROUND_NAMES: Record<BaseColor, readonly [ForegroundColorName, ForegroundColorName]> = {
  black: ["black", "blackBright"],
  red: ["red", "redBright"],
  green: ["green", "greenBright"],
  yellow: ["yellow", "yellowBright"],
  blue: ["blue", "blueBright"],
  magenta: ["magenta", "magentaBright"],
  cyan: ["cyan", "cyanBright"],
  white: ["white", "whiteBright"],
};

const BACKGROUND_NAMES: Record<BaseColor, readonly [BackgroundColorName, BackgroundColorName]> = {
  black: ["bgBlack", "bgBlackBright"],
  red: ["bgRed", "bgRedBright"],
  green: ["bgGreen", "bgGreenBright"],
  yellow: ["bgYellow", "bgYellowBright"],
  blue: ["bgBlue", "bgBlueBright"],
  magenta: ["bgMagenta", "bgMagentaBright"],
  cyan: ["bgCyan", "bgCyanBright"],
  white: ["bgWhite", "bgWhiteBright"],
};

function applyForeground(painter: ChalkInstance, color: Color): ChalkInstance {
  switch (color.type) {
    case "named":
      return painter[FOREGROUND_NAMES[color.name][color.bright ? 1 : 0]];
    case "fixed":
      return painter.ansi256(color.code);
    case "hex":
      return painter.hex(color.hex);
  }
}

function applyBackground(painter: ChalkInstance, color: Color): ChalkInstance {
  switch (color.type) {
    case "named":
      return painter[BACKGROUND_NAMES[color.name][color.bright ? 1 : 0]];
    case "fixed":
      return painter.bgAnsi256(color.code);
    case "hex":
      return painter.bgHex(color.hex);
  }
}

/**
 * Build a chalk painter for a style.
 *
 * Modifiers are chained first (in {@link STYLE_MODIFIERS} order), then the
 * foreground, then the background.
 */
export function stylePainter(style: Style, instance: ChalkInstance = chalk): ChalkInstance {
  let painter = instance;

  for (const modifier of STYLE_MODIFIERS) {
    if (style[modifier]) {
      painter = painter[MODIFIER_METHODS[modifier]];
    }
  }
  if (style.fg) {
    painter = applyForeground(painter, style.fg);
  }
  if (style.bg) {
    painter = applyBackground(painter, style.bg);
  }

  return painter;
}

/**
 * Paint text with a style. Unstyled text is returned untouched.
 *
 * @example
 * ```typescript
 * const red = parseStyleString("red");
 * if (red.ok) process.stdout.write(paint("hello", red.value));
 * ```
 */
export function paint(text: string, style?: Style, instance: ChalkInstance = chalk): string {
  if (style === undefined || isEmptyStyle(style)) {
    return text;
  }
  return stylePainter(style, instance)(text);
}
