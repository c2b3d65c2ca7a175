import * as fs from "node:fs";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createSandbox, type Sandbox } from "../commands/__tests__/helpers.js";
import { createProgram, emit } from "../program.js";

describe("createProgram", () => {
  it("registers the module and explain commands", () => {
    const program = createProgram();
    expect(program.name()).toBe("shellmark");
    expect(program.commands.map((command) => command.name())).toEqual(["module", "explain"]);
  });

  it("defaults --root to the real filesystem root", () => {
    const module = createProgram().commands.find((command) => command.name() === "module");
    expect(module?.options.map((option) => option.long)).toEqual(["--root", "--config", "--no-color"]);
    expect(module?.options[0]?.defaultValue).toBe("/");
  });

  it("leaves color unset for explain, which has no --no-color flag", () => {
    const explain = createProgram().commands.find((command) => command.name() === "explain");
    expect(explain?.options.map((option) => option.long)).toEqual(["--root", "--config"]);
    expect(explain?.opts().color).toBeUndefined();
  });
});

describe("emit", () => {
  let sandbox: Sandbox;

  function captureOutput() {
    return {
      stdout: vi.spyOn(process.stdout, "write").mockImplementation(() => true),
      stderr: vi.spyOn(process.stderr, "write").mockImplementation(() => true),
    };
  }

  beforeEach(() => {
    sandbox = createSandbox();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    sandbox.cleanup();
  });

  it("writes successful output to stdout unchanged", () => {
    const { stdout, stderr } = captureOutput();
    emit({ kind: "success", output: "⬢ [Docker] " });

    expect(stdout).toHaveBeenCalledWith("⬢ [Docker] ");
    expect(stderr).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(0);
  });

  it("writes errors to stderr with a usage exit code", () => {
    const { stdout, stderr } = captureOutput();
    emit({ kind: "error", code: "MODULE_NOT_FOUND", message: "Unknown module 'battery'" });

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0]?.[0])).toContain("Unknown module 'battery'\n");
    expect(process.exitCode).toBe(2);
  });

  it.runIf(process.platform === "linux")("runs the module command from argv", () => {
    const { stdout } = captureOutput();
    fs.writeFileSync(sandbox.configPath, '[container]\nformat = "$name"\n');
    sandbox.write("/.dockerenv", "");

    createProgram().parse(
      ["module", "container", "--root", sandbox.root, "--config", sandbox.configPath, "--no-color"],
      { from: "user" }
    );

    expect(stdout).toHaveBeenCalledWith("Docker");
    expect(process.exitCode).toBe(0);
  });
});
