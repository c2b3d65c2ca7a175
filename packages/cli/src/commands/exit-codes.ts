/**
 * Exit Codes
 *
 * Maps command results to process exit codes:
 * - 0: Success (including "module rendered nothing")
 * - 1: General error
 * - 2: Usage/argument error
 *
 * @module cli/commands/exit-codes
 */

import type { CommandError, CommandErrorCode, CommandResult } from "./types.js";

export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Usage/argument error */
  USAGE_ERROR: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

const ERROR_CODE_EXIT_MAP: Partial<Record<CommandErrorCode, ExitCode>> = {
  MODULE_NOT_FOUND: EXIT_CODES.USAGE_ERROR,
};

/**
 * Maps CommandResult types to process exit codes
 *
 * @example
 * ```typescript
 * process.exitCode = ExitCodeMapper.fromResult(runModuleCommand("container"));
 * ```
 */
// biome-ignore lint/complexity/noStaticOnlyClass: ExitCodeMapper provides a logical grouping for exit code mapping
export class ExitCodeMapper {
  static fromResult(result: CommandResult): ExitCode {
    switch (result.kind) {
      case "success":
        return EXIT_CODES.SUCCESS;
      case "error":
        return ExitCodeMapper.fromError(result);
    }
  }

  static fromError(error: CommandError): ExitCode {
    return ERROR_CODE_EXIT_MAP[error.code] ?? EXIT_CODES.ERROR;
  }
}
