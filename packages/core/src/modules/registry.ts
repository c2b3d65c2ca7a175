import type { PromptConfig } from "../config/index.js";
import type { Context } from "../context/index.js";
import type { Logger } from "../logger/index.js";
import { containerModule } from "./container.js";
import type { Module, ModuleRenderer } from "./types.js";

/**
 * Every module the prompt knows how to render, by name.
 */
export const MODULES: ReadonlyMap<string, ModuleRenderer> = new Map<string, ModuleRenderer>([
  ["container", (context, config, logger) => containerModule(context, config.container, logger)],
]);

export function listModules(): string[] {
  return [...MODULES.keys()];
}

/**
 * Render a module by name. Unknown names are logged and render nothing.
 */
export function renderModule(
  name: string,
  context: Context,
  config: PromptConfig,
  logger: Logger
): Module | undefined {
  const renderer = MODULES.get(name);
  if (!renderer) {
    logger.warn(`Unknown module: ${name}`, { available: listModules() });
    return undefined;
  }
  return renderer(context, config, logger);
}
