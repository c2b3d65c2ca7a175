/**
 * Template Parser
 *
 * Grammar:
 * - plain text is copied verbatim
 * - `$name` / `${name}` reference a variable
 * - `[text](style string)` paints `text` with a style; the style string mixes
 *   literal style words (`bold`, `fg:red`) with `$variables`
 * - `(text)` is only shown when a variable inside it renders non-empty text
 * - `\` escapes the next character
 *
 * @module formatter/parser
 */

import { Err, Ok, parseStyleString, type Result } from "@shellmark/shared";
import { FormatError } from "../errors/index.js";
import type { ParsedTemplate, StyleWord, TemplateToken } from "./types.js";

const NAME_CHAR = /[A-Za-z0-9_]/;
const NAME = /^[A-Za-z0-9_]+$/;

type Closing = "]" | ")";

class TemplateParser {
  private pos = 0;

  constructor(private readonly source: string) {}

  parse(): Result<TemplateToken[], FormatError> {
    return this.parseSequence(undefined);
  }

  /**
   * Parse tokens up to (not including) `closing`, or to the end of input
   * at the top level.
   */
  private parseSequence(closing: Closing | undefined): Result<TemplateToken[], FormatError> {
    const tokens: TemplateToken[] = [];
    let literal = "";

    const flush = (): void => {
      if (literal.length > 0) {
        tokens.push({ kind: "literal", text: literal });
        literal = "";
      }
    };

    while (this.pos < this.source.length) {
      const char = this.source.charAt(this.pos);

      if (char === closing) {
        flush();
        return Ok(tokens);
      }

      switch (char) {
        case "\\": {
          if (this.pos + 1 >= this.source.length) {
            return this.fail("Trailing escape character", this.pos);
          }
          literal += this.source.charAt(this.pos + 1);
          this.pos += 2;
          break;
        }
        case "$": {
          flush();
          const name = this.parseVariableName();
          if (!name.ok) return name;
          tokens.push({ kind: "variable", name: name.value });
          break;
        }
        case "[": {
          flush();
          const group = this.parseStyleGroup();
          if (!group.ok) return group;
          tokens.push(group.value);
          break;
        }
        case "(": {
          flush();
          const group = this.parseConditional();
          if (!group.ok) return group;
          tokens.push(group.value);
          break;
        }
        case "]":
        case ")":
          return this.fail(`Unexpected '${char}'`, this.pos);
        default:
          literal += char;
          this.pos++;
      }
    }

    if (closing !== undefined) {
      return this.fail(`Missing closing '${closing}'`, this.pos);
    }

    flush();
    return Ok(tokens);
  }

  private parseVariableName(): Result<string, FormatError> {
    const start = this.pos;
    this.pos++; // $

    const braced = this.source.charAt(this.pos) === "{";
    if (braced) {
      this.pos++;
    }

    let name = "";
    while (this.pos < this.source.length && NAME_CHAR.test(this.source.charAt(this.pos))) {
      name += this.source.charAt(this.pos);
      this.pos++;
    }

    if (name.length === 0) {
      return this.fail("Expected a variable name after '$'", start);
    }

    if (braced) {
      if (this.source.charAt(this.pos) !== "}") {
        return this.fail("Missing closing '}' in variable reference", start);
      }
      this.pos++;
    }

    return Ok(name);
  }

  private parseStyleGroup(): Result<TemplateToken, FormatError> {
    const start = this.pos;
    this.pos++; // [

    const children = this.parseSequence("]");
    if (!children.ok) return children;
    this.pos++; // ]

    if (this.source.charAt(this.pos) !== "(") {
      return this.fail("Expected '(' with a style after text group", this.pos);
    }

    const styleStart = this.pos + 1;
    const styleEnd = this.source.indexOf(")", styleStart);
    if (styleEnd === -1) {
      return this.fail("Missing closing ')' for style", start);
    }
    this.pos = styleEnd + 1;

    const style = parseStyleWords(this.source.slice(styleStart, styleEnd), styleStart);
    if (!style.ok) return style;

    return Ok({ kind: "style-group", children: children.value, style: style.value });
  }

  private parseConditional(): Result<TemplateToken, FormatError> {
    this.pos++; // (

    const children = this.parseSequence(")");
    if (!children.ok) return children;
    this.pos++; // )

    return Ok({ kind: "conditional", children: children.value });
  }

  private fail(message: string, position: number): Result<never, FormatError> {
    return Err(
      new FormatError("Syntax", `${message} at position ${position} in '${this.source}'`, {
        position,
      })
    );
  }
}

/**
 * Split a style string into words. Literal words are validated here so a
 * typo in a template is reported when the template is parsed.
 */
function parseStyleWords(text: string, position: number): Result<StyleWord[], FormatError> {
  const words: StyleWord[] = [];

  for (const word of text.split(/\s+/).filter((w) => w.length > 0)) {
    if (word.startsWith("$")) {
      const name = word.slice(1).replace(/^\{(.*)\}$/, "$1");
      if (!NAME.test(name)) {
        return Err(
          new FormatError("Syntax", `Invalid style variable '${word}' at position ${position}`, {
            position,
          })
        );
      }
      words.push({ kind: "variable", name });
      continue;
    }

    if (word.toLowerCase() === "none") {
      words.push({ kind: "reset" });
      continue;
    }

    const style = parseStyleString(word);
    if (!style.ok) {
      return Err(
        new FormatError("InvalidStyle", style.error.message, {
          position,
          cause: style.error,
        })
      );
    }
    words.push({ kind: "literal", style: style.value });
  }

  return Ok(words);
}

/**
 * Parse a template string into tokens.
 *
 * @example
 * ```typescript
 * const parsed = parseTemplate("[$symbol \\[$name\\]]($style) ");
 * // [style-group [$symbol, " [", $name, "]"] ($style), " "]
 * ```
 */
export function parseTemplate(template: string): Result<ParsedTemplate, FormatError> {
  const tokens = new TemplateParser(template).parse();
  if (!tokens.ok) return tokens;
  return Ok({ source: template, tokens: tokens.value });
}
