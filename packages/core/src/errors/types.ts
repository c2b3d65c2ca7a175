// ============================================
// Shellmark Error Types
// ============================================

import { ErrorCode } from "@shellmark/shared";

/**
 * Options for creating a ShellmarkError.
 */
export interface ShellmarkErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional context about the error */
  context?: Record<string, unknown>;
}

/**
 * Base error class for all Shellmark errors.
 *
 * Provides:
 * - Categorized error codes
 * - Error cause chaining
 * - Additional context
 */
export class ShellmarkError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, options?: ShellmarkErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "ShellmarkError";
    this.code = code;
    this.context = options?.context;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Returns a JSON-serializable representation of this error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

// ============================================
// Format Errors
// ============================================

/**
 * What went wrong while parsing or rendering a template.
 */
export type FormatErrorKind =
  | "Syntax"
  | "UnknownVariable"
  | "UnknownStyle"
  | "UnresolvedMeta"
  | "ResolverValue"
  | "InvalidStyle";

const FORMAT_ERROR_CODES: Record<FormatErrorKind, ErrorCode> = {
  Syntax: ErrorCode.FORMAT_SYNTAX,
  UnknownVariable: ErrorCode.FORMAT_UNKNOWN_VARIABLE,
  UnknownStyle: ErrorCode.FORMAT_UNKNOWN_STYLE,
  UnresolvedMeta: ErrorCode.FORMAT_UNRESOLVED_META,
  ResolverValue: ErrorCode.FORMAT_RESOLVER_VALUE,
  InvalidStyle: ErrorCode.STYLE_INVALID,
};

/**
 * Error produced by the template formatter.
 *
 * `variable` is the variable or style name involved (when there is one) and
 * `position` the character offset in the template (syntax errors only).
 */
export class FormatError extends ShellmarkError {
  public readonly kind: FormatErrorKind;
  public readonly variable?: string;
  public readonly position?: number;

  constructor(
    kind: FormatErrorKind,
    message: string,
    details: { variable?: string; position?: number; cause?: unknown } = {}
  ) {
    super(message, FORMAT_ERROR_CODES[kind], {
      cause: details.cause,
      context: { kind, variable: details.variable, position: details.position },
    });
    this.name = "FormatError";
    this.kind = kind;
    this.variable = details.variable;
    this.position = details.position;
  }
}

// ============================================
// Probe Errors
// ============================================

/**
 * An existing marker file could not be read as text.
 * Never thrown out of detection: the probe just does not match.
 */
export class ProbeReadError extends ShellmarkError {
  public readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`Failed to read marker file: ${path}`, ErrorCode.PROBE_READ_FAILED, {
      cause,
      context: { path },
    });
    this.name = "ProbeReadError";
    this.path = path;
  }
}

/**
 * Type guard for ShellmarkError instances.
 */
export function isShellmarkError(error: unknown): error is ShellmarkError {
  return error instanceof ShellmarkError;
}
