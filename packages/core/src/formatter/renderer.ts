/**
 * Template Renderer
 *
 * Resolves a parsed template against caller-supplied resolvers and produces
 * styled segments. Rendering happens in two passes: meta variables are bound
 * first, then everything else is resolved while walking the token tree.
 *
 * @module formatter/renderer
 */

import { Err, flatMap, isEmptyStyle, mergeStyles, Ok, type Result, type Style } from "@shellmark/shared";
import { FormatError } from "../errors/index.js";
import { parseTemplate } from "./parser.js";
import type {
  ParsedTemplate,
  Resolution,
  Segment,
  StyleWord,
  TemplateResolvers,
  TemplateToken,
} from "./types.js";

interface RenderedTokens {
  segments: Segment[];
  /** Whether any variable in the tokens rendered non-empty text */
  hasValue: boolean;
}

/**
 * Replace every variable the meta resolver recognizes with a `meta` token.
 */
export function bindMeta(
  tokens: readonly TemplateToken[],
  meta: TemplateResolvers["meta"]
): Result<TemplateToken[], FormatError> {
  const bound: TemplateToken[] = [];

  for (const token of tokens) {
    switch (token.kind) {
      case "variable": {
        const resolution = meta(token.name);
        if (resolution === undefined) {
          bound.push(token);
        } else if (resolution.ok) {
          bound.push({ kind: "meta", name: token.name, value: resolution.value });
        } else {
          return Err(
            new FormatError(
              "UnresolvedMeta",
              `Failed to resolve meta variable '${token.name}': ${resolution.error.message}`,
              { variable: token.name, cause: resolution.error }
            )
          );
        }
        break;
      }
      case "style-group":
      case "conditional": {
        const children = bindMeta(token.children, meta);
        if (!children.ok) return children;
        bound.push({ ...token, children: children.value });
        break;
      }
      default:
        bound.push(token);
    }
  }

  return Ok(bound);
}

function resolveVariable(name: string, resolution: Resolution<string>): Result<string, FormatError> {
  if (resolution === undefined) {
    return Err(
      new FormatError("UnknownVariable", `Variable '${name}' is not defined`, { variable: name })
    );
  }
  if (!resolution.ok) {
    return Err(
      new FormatError(
        "ResolverValue",
        `Failed to resolve variable '${name}': ${resolution.error.message}`,
        { variable: name, cause: resolution.error }
      )
    );
  }
  return resolution;
}

/**
 * Fold a style string's words into one style, layered over the inherited one.
 * Later words win; `none` drops the inherited style and everything the group
 * set so far.
 */
function resolveStyle(
  words: readonly StyleWord[],
  resolvers: TemplateResolvers,
  inherited: Style | undefined
): Result<Style, FormatError> {
  let base = inherited;
  let style: Style = {};

  for (const word of words) {
    switch (word.kind) {
      case "reset":
        base = undefined;
        style = {};
        break;
      case "literal":
        style = mergeStyles(style, word.style);
        break;
      case "variable": {
        const resolution = resolvers.style(word.name);
        if (resolution === undefined) {
          return Err(
            new FormatError("UnknownStyle", `Style variable '${word.name}' is not defined`, {
              variable: word.name,
            })
          );
        }
        if (!resolution.ok) {
          return Err(
            new FormatError(
              "ResolverValue",
              `Failed to resolve style '${word.name}': ${resolution.error.message}`,
              { variable: word.name, cause: resolution.error }
            )
          );
        }
        style = mergeStyles(style, resolution.value);
        break;
      }
    }
  }

  return Ok(mergeStyles(base, style));
}

function renderTokens(
  tokens: readonly TemplateToken[],
  resolvers: TemplateResolvers,
  inherited: Style | undefined
): Result<RenderedTokens, FormatError> {
  const segments: Segment[] = [];
  let hasValue = false;

  const push = (text: string): void => {
    if (text.length === 0) return;
    segments.push(isEmptyStyle(inherited) ? { text } : { text, style: inherited });
  };

  for (const token of tokens) {
    switch (token.kind) {
      case "literal":
        push(token.text);
        break;
      case "meta":
        push(token.value);
        hasValue ||= token.value.length > 0;
        break;
      case "variable": {
        const value = resolveVariable(token.name, resolvers.variable(token.name));
        if (!value.ok) return value;
        push(value.value);
        hasValue ||= value.value.length > 0;
        break;
      }
      case "style-group": {
        const style = resolveStyle(token.style, resolvers, inherited);
        if (!style.ok) return style;
        const children = renderTokens(token.children, resolvers, style.value);
        if (!children.ok) return children;
        segments.push(...children.value.segments);
        hasValue ||= children.value.hasValue;
        break;
      }
      case "conditional": {
        const children = renderTokens(token.children, resolvers, inherited);
        if (!children.ok) return children;
        if (children.value.hasValue) {
          segments.push(...children.value.segments);
          hasValue = true;
        }
        break;
      }
    }
  }

  return Ok({ segments, hasValue });
}

/**
 * Render a parsed template into segments.
 *
 * Fails when a referenced name is unknown to every resolver or a resolver
 * hands back an error; nothing partial is returned in that case.
 */
export function renderTemplate(
  parsed: ParsedTemplate,
  resolvers: TemplateResolvers
): Result<Segment[], FormatError> {
  const bound = bindMeta(parsed.tokens, resolvers.meta);
  if (!bound.ok) return bound;

  const rendered = renderTokens(bound.value, resolvers, undefined);
  if (!rendered.ok) return rendered;

  return Ok(rendered.value.segments);
}

/**
 * Parse and render in one step.
 */
export function formatTemplate(
  template: string,
  resolvers: TemplateResolvers
): Result<Segment[], FormatError> {
  return flatMap(parseTemplate(template), (parsed) => renderTemplate(parsed, resolvers));
}
