import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { defaultConfig } from "../../config/index.js";
import { Context } from "../../context/index.js";
import { Logger } from "../../logger/index.js";
import type { LogEntry, LogTransport } from "../../logger/index.js";
import { listModules, MODULES, renderModule } from "../registry.js";

function createMockTransport(): LogTransport & { entries: LogEntry[] } {
  return {
    entries: [],
    log(entry: LogEntry) {
      this.entries.push(entry);
    },
  };
}

describe("module registry", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "shellmark-registry-"));
    fs.writeFileSync(path.join(root, ".dockerenv"), "");
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("registers the container module", () => {
    expect(listModules()).toEqual(["container"]);
    expect(MODULES.has("container")).toBe(true);
  });

  it("renders a module by name with its config table", () => {
    const context = new Context({ root, platform: "linux" });
    const config = defaultConfig();
    const logger = new Logger({ level: "warn" });

    const module = renderModule(
      "container",
      context,
      { ...config, container: { ...config.container, format: "$name" } },
      logger
    );

    expect(module).toEqual({ name: "container", segments: [{ text: "Docker" }] });
  });

  it("warns on unknown module names", () => {
    const transport = createMockTransport();
    const logger = new Logger({ level: "warn", transports: [transport] });
    const context = new Context({ root, platform: "linux" });

    expect(renderModule("battery", context, defaultConfig(), logger)).toBeUndefined();
    expect(transport.entries).toHaveLength(1);
    expect(transport.entries[0]?.message).toBe("Unknown module: battery");
    expect(transport.entries[0]?.data).toEqual({ available: ["container"] });
  });
});
