import * as fs from "node:fs";
import * as path from "node:path";
import {
  Context,
  createLogger,
  defaultConfig,
  loadConfig,
  type Logger,
  type PromptConfig,
} from "@shellmark/core";
import type { RenderCommandOptions } from "./types.js";

/**
 * Everything a module needs for one render pass.
 */
export interface RenderSetup {
  readonly context: Context;
  readonly config: PromptConfig;
  readonly logger: Logger;
}

/**
 * Build the context, then load the config from its environment and build the logger.
 *
 * A broken config never stops the prompt: the problem is logged and the
 * defaults are used instead.
 */
export function prepareRender(options: RenderCommandOptions = {}): RenderSetup {
  const context = new Context({ root: options.root, platform: options.platform, env: options.env });
  const loaded = loadConfig({ path: options.config, env: context.env });
  const config = loaded.ok ? loaded.value : defaultConfig();
  const logger = options.logger ?? createLogger({ level: config.logLevel });

  if (!loaded.ok) {
    logger.error(loaded.error.message, { code: loaded.error.code, path: loaded.error.path });
  } else if (options.config !== undefined && !fs.existsSync(path.resolve(options.config))) {
    logger.warn(`Config file not found: ${path.resolve(options.config)}`);
  }

  return { context, config, logger };
}
