/**
 * Command Type Definitions
 *
 * Result and option types shared by the `shellmark` subcommands.
 *
 * @module cli/commands/types
 */

import type { Logger } from "@shellmark/core";

// =============================================================================
// Results
// =============================================================================

/**
 * Error codes a command can finish with
 */
export type CommandErrorCode = "MODULE_NOT_FOUND";

/**
 * Command finished; `output` is written to stdout as is
 */
export interface CommandSuccess {
  readonly kind: "success";
  readonly output: string;
}

/**
 * Command failed before rendering anything
 */
export interface CommandError {
  readonly kind: "error";
  readonly code: CommandErrorCode;
  readonly message: string;
}

export type CommandResult = CommandSuccess | CommandError;

// =============================================================================
// Options
// =============================================================================

/**
 * Options shared by commands that render a module
 */
export interface RenderCommandOptions {
  /** Filesystem root to probe (default: "/") */
  root?: string;
  /** Explicit config file path */
  config?: string;
  /** Emit ANSI styling (default: true) */
  color?: boolean;
  /** Environment variables (default: process.env) */
  env?: Readonly<Record<string, string | undefined>>;
  /** Host platform (default: process.platform) */
  platform?: NodeJS.Platform;
  /** Logger to use instead of one built from the config's log level */
  logger?: Logger;
}

export function success(output: string): CommandSuccess {
  return { kind: "success", output };
}

export function failure(code: CommandErrorCode, message: string): CommandError {
  return { kind: "error", code, message };
}
