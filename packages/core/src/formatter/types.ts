/**
 * Template Formatter Types
 *
 * @module formatter/types
 */

import type { Result, Style } from "@shellmark/shared";

// =============================================================================
// Tokens
// =============================================================================

/**
 * One word of a style group's style string: a `$variable` resolved at render
 * time, a literal style word parsed up front, or `none`.
 */
export type StyleWord =
  | { readonly kind: "variable"; readonly name: string }
  | { readonly kind: "literal"; readonly style: Style }
  | { readonly kind: "reset" };

/**
 * Parsed template node.
 *
 * The parser only emits `variable` references; {@link bindMeta} rewrites the
 * ones its meta resolver recognizes into `meta` tokens carrying their text.
 */
export type TemplateToken =
  | { readonly kind: "literal"; readonly text: string }
  | { readonly kind: "variable"; readonly name: string }
  | { readonly kind: "meta"; readonly name: string; readonly value: string }
  | {
      readonly kind: "style-group";
      readonly children: readonly TemplateToken[];
      readonly style: readonly StyleWord[];
    }
  | { readonly kind: "conditional"; readonly children: readonly TemplateToken[] };

export interface ParsedTemplate {
  readonly source: string;
  readonly tokens: readonly TemplateToken[];
}

// =============================================================================
// Resolvers
// =============================================================================

/**
 * `undefined` means "name not recognized"; an `Err` means the name is known
 * but its value is broken.
 */
export type Resolution<T> = Result<T, Error> | undefined;

/**
 * Late-bound lookups a caller supplies for one render.
 */
export interface TemplateResolvers {
  /** Display values (`$name`) */
  variable(name: string): Resolution<string>;
  /** Plain-string values substituted before rendering (`$symbol`) */
  meta(name: string): Resolution<string>;
  /** Style variables used inside `[...](...)` style strings (`$style`) */
  style(name: string): Resolution<Style>;
}

// =============================================================================
// Output
// =============================================================================

/**
 * A run of output text sharing one style.
 */
export interface Segment {
  readonly text: string;
  readonly style?: Style;
}
