/**
 * `shellmark explain <name>`: show what a module detected and rendered.
 *
 * @module cli/commands/explain
 */

import {
  type Context,
  detectContainer,
  formatContainer,
  type Logger,
  type Module,
  MODULES,
  type PromptConfig,
  renderModule,
  type Segment,
  segmentsToText,
} from "@shellmark/core";
import { unknownModule } from "./module.js";
import { prepareRender } from "./setup.js";
import { type CommandResult, type RenderCommandOptions, success } from "./types.js";

interface Explained {
  readonly detected: string | undefined;
  readonly module: Module | undefined;
}

type Explainer = (context: Context, config: PromptConfig, logger: Logger) => Explained;

/**
 * Modules whose detected value is reported apart from the rendered output.
 * Each runs detection once and renders from that result.
 */
const EXPLAINERS: ReadonlyMap<string, Explainer> = new Map<string, Explainer>([
  [
    "container",
    (context, config, logger) => {
      if (config.container.disabled) {
        return { detected: undefined, module: undefined };
      }
      const detected = detectContainer(
        context,
        config.container,
        logger.child({ module: "container" })
      );
      return {
        detected,
        module: detected === undefined ? undefined : formatContainer(detected, config.container, logger),
      };
    },
  ],
]);

export interface ModuleExplanation {
  readonly module: string;
  readonly root: string;
  /** Value found by the module's detection, null when nothing matched */
  readonly detected: string | null;
  readonly rendered: boolean;
  readonly text: string;
  readonly segments: readonly Segment[];
}

export function explainModule(
  name: string,
  options: RenderCommandOptions = {}
): ModuleExplanation | undefined {
  if (!MODULES.has(name)) {
    return undefined;
  }

  const { context, config, logger } = prepareRender(options);
  const explainer = EXPLAINERS.get(name);
  const { detected, module } = explainer
    ? explainer(context, config, logger)
    : { detected: undefined, module: renderModule(name, context, config, logger) };

  return {
    module: name,
    root: context.root,
    detected: detected ?? null,
    rendered: module !== undefined,
    text: module ? segmentsToText(module.segments) : "",
    segments: module?.segments ?? [],
  };
}

export function runExplainCommand(name: string, options: RenderCommandOptions = {}): CommandResult {
  const explanation = explainModule(name, options);
  if (!explanation) {
    return unknownModule(name);
  }
  return success(`${JSON.stringify(explanation, null, 2)}\n`);
}
