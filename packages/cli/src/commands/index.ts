export { explainModule, type ModuleExplanation, runExplainCommand } from "./explain.js";
export { EXIT_CODES, type ExitCode, ExitCodeMapper } from "./exit-codes.js";
export { runModuleCommand, unknownModule } from "./module.js";
export { prepareRender, type RenderSetup } from "./setup.js";
export * from "./types.js";
