import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CONTAINER_DEFAULTS } from "../defaults.js";
import {
  deepMerge,
  loadConfig,
  parseEnvConfig,
  readTomlFile,
  resolveConfigPath,
} from "../loader.js";
import { defaultConfig } from "../schema.js";

describe("resolveConfigPath", () => {
  it("prefers an explicit path", () => {
    expect(resolveConfigPath("/etc/prompt.toml", { SHELLMARK_CONFIG: "/tmp/other.toml" })).toBe(
      path.resolve("/etc/prompt.toml")
    );
  });

  it("falls back to SHELLMARK_CONFIG", () => {
    expect(resolveConfigPath(undefined, { SHELLMARK_CONFIG: "/tmp/other.toml" })).toBe(
      path.resolve("/tmp/other.toml")
    );
  });

  it("ignores an empty SHELLMARK_CONFIG", () => {
    expect(resolveConfigPath(undefined, { SHELLMARK_CONFIG: "" })).toBe(
      path.join(os.homedir(), ".config", "shellmark.toml")
    );
  });
});

describe("parseEnvConfig", () => {
  it("maps SHELLMARK_LOG_LEVEL", () => {
    expect(parseEnvConfig({ SHELLMARK_LOG_LEVEL: "debug" })).toEqual({ log_level: "debug" });
  });

  it("ignores unset and empty variables", () => {
    expect(parseEnvConfig({ SHELLMARK_LOG_LEVEL: "" })).toEqual({});
    expect(parseEnvConfig({})).toEqual({});
  });
});

describe("deepMerge", () => {
  it("merges nested tables with later sources winning", () => {
    const merged = deepMerge(
      { log_level: "warn", container: { symbol: "A", disabled: false } },
      { container: { symbol: "B" } }
    );
    expect(merged).toEqual({ log_level: "warn", container: { symbol: "B", disabled: false } });
  });

  it("replaces arrays and skips undefined", () => {
    expect(deepMerge({ a: [1, 2], b: 1 }, { a: [3], b: undefined })).toEqual({ a: [3], b: 1 });
  });
});

describe("defaultConfig", () => {
  it("applies every container default", () => {
    const config = defaultConfig();
    expect(config.logLevel).toBe("warn");
    expect(config.container).toEqual({
      disabled: false,
      format: "[$symbol \\[$name\\]]($style) ",
      symbol: "⬢",
      style: "red bold dimmed",
      useContainerName: false,
    });
  });
});

describe("loadConfig", () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "shellmark-config-"));
    configPath = path.join(tempDir, "shellmark.toml");
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("returns defaults when the file does not exist", () => {
    const result = loadConfig({ path: configPath, env: {} });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toEqual(defaultConfig());
    }
  });

  it("reads the [container] table", () => {
    fs.writeFileSync(
      configPath,
      [
        'log_level = "debug"',
        "[container]",
        'format = "[$name]($style)"',
        'symbol = "C"',
        'style = "blue"',
        "use_container_name = true",
      ].join("\n")
    );

    const result = loadConfig({ path: configPath, env: {} });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.logLevel).toBe("debug");
      expect(result.value.container).toEqual({
        disabled: false,
        format: "[$name]($style)",
        symbol: "C",
        style: "blue",
        useContainerName: true,
      });
    }
  });

  it("finds the file through SHELLMARK_CONFIG", () => {
    fs.writeFileSync(configPath, "[container]\ndisabled = true\n");

    const result = loadConfig({ env: { SHELLMARK_CONFIG: configPath } });
    expect(result.ok && result.value.container.disabled).toBe(true);
  });

  it("lets the environment override the file", () => {
    fs.writeFileSync(configPath, 'log_level = "error"\n');

    const result = loadConfig({ path: configPath, env: { SHELLMARK_LOG_LEVEL: "trace" } });
    expect(result.ok && result.value.logLevel).toBe("trace");
  });

  it("skips the environment when asked", () => {
    const result = loadConfig({
      path: configPath,
      env: { SHELLMARK_LOG_LEVEL: "trace" },
      skipEnv: true,
    });
    expect(result.ok && result.value.logLevel).toBe("warn");
  });

  it("reports TOML syntax errors", () => {
    fs.writeFileSync(configPath, "[container\nsymbol = ");

    const result = loadConfig({ path: configPath, env: {} });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("PARSE_ERROR");
      expect(result.error.path).toBe(configPath);
    }
  });

  it("reports schema violations with the offending key", () => {
    fs.writeFileSync(configPath, "[container]\nuse_container_name = \"yes\"\n");

    const result = loadConfig({ path: configPath, env: {} });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("VALIDATION_ERROR");
      expect(result.error.message).toContain("container.use_container_name");
    }
  });

  it("reports unreadable paths as read errors", () => {
    fs.mkdirSync(configPath);

    const result = readTomlFile(configPath);
    expect(!result.ok && result.error.code).toBe("READ_ERROR");
  });

  it("keeps the default symbol when only the style is customised", () => {
    fs.writeFileSync(configPath, '[container]\nstyle = "green"\n');

    const result = loadConfig({ path: configPath, env: {} });
    expect(result.ok && result.value.container.symbol).toBe(CONTAINER_DEFAULTS.symbol);
  });
});
