import { Command } from "commander";
import chalk from "chalk";
import {
  type CommandResult,
  ExitCodeMapper,
  runExplainCommand,
  runModuleCommand,
} from "./commands/index.js";
import { version } from "./version.js";

interface RenderFlags {
  root: string;
  config?: string;
  color?: boolean;
}

/**
 * Write a command result and set the process exit code.
 */
export function emit(result: CommandResult): void {
  if (result.kind === "success") {
    process.stdout.write(result.output);
  } else {
    process.stderr.write(`${chalk.red("error")}: ${result.message}\n`);
  }
  process.exitCode = ExitCodeMapper.fromResult(result);
}

export function createProgram(): Command {
  const program = new Command();

  program.name("shellmark").description("Render prompt segments for your shell").version(version);

  program
    .command("module <name>")
    .description("Print a rendered module for the prompt")
    .option("-r, --root <dir>", "Filesystem root to probe", "/")
    .option("-c, --config <path>", "Config file (default: $SHELLMARK_CONFIG or ~/.config/shellmark.toml)")
    .option("--no-color", "Print plain text without ANSI styling")
    .action((name: string, flags: RenderFlags) => {
      emit(runModuleCommand(name, flags));
    });

  program
    .command("explain <name>")
    .description("Show what a module detected and rendered, as JSON")
    .option("-r, --root <dir>", "Filesystem root to probe", "/")
    .option("-c, --config <path>", "Config file (default: $SHELLMARK_CONFIG or ~/.config/shellmark.toml)")
    .action((name: string, flags: RenderFlags) => {
      emit(runExplainCommand(name, flags));
    });

  return program;
}
