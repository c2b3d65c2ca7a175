import type { PromptConfig } from "../config/index.js";
import type { Context } from "../context/index.js";
import type { Segment } from "../formatter/index.js";
import type { Logger } from "../logger/index.js";

/**
 * A rendered status-line module: its name and the styled segments it produced.
 */
export interface Module {
  readonly name: string;
  readonly segments: readonly Segment[];
}

/**
 * Builds one module for one render pass. Returning undefined means the
 * module has nothing to show (disabled, not applicable, or broken template).
 */
export type ModuleRenderer = (
  context: Context,
  config: PromptConfig,
  logger: Logger
) => Module | undefined;
