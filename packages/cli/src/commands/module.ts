/**
 * `shellmark module <name>`: print one rendered module for the shell prompt.
 *
 * @module cli/commands/module
 */

import { listModules, MODULES, renderModule, segmentsToAnsi } from "@shellmark/core";
import { Chalk } from "chalk";
import { prepareRender } from "./setup.js";
import { type CommandResult, failure, type RenderCommandOptions, success } from "./types.js";

export function unknownModule(name: string): CommandResult {
  return failure(
    "MODULE_NOT_FOUND",
    `Unknown module '${name}'. Available modules: ${listModules().join(", ")}`
  );
}

/**
 * Render a module to ANSI text. An absent module renders as empty output.
 */
export function runModuleCommand(name: string, options: RenderCommandOptions = {}): CommandResult {
  if (!MODULES.has(name)) {
    return unknownModule(name);
  }

  const { context, config, logger } = prepareRender(options);
  const module = renderModule(name, context, config, logger);
  if (!module) {
    return success("");
  }

  // stdout is rarely a TTY inside a prompt, so color support is not auto-detected
  const chalk = new Chalk({ level: options.color === false ? 0 : 3 });
  return success(segmentsToAnsi(module.segments, chalk));
}
