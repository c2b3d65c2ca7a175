import * as fs from "node:fs";
import * as path from "node:path";
import { mapErr, type Result, tryCatch } from "@shellmark/shared";
import { ProbeReadError } from "../errors/index.js";

/**
 * Options for creating a render Context.
 */
export interface ContextOptions {
  /** Filesystem root that logical paths resolve against (default: "/") */
  root?: string;
  /** Host platform (default: process.platform) */
  platform?: NodeJS.Platform;
  /** Environment variables (default: process.env) */
  env?: Readonly<Record<string, string | undefined>>;
}

/**
 * Read-only view of the environment for a single render pass.
 *
 * Every filesystem access goes through {@link Context.resolve}, so tests can
 * point `root` at a temporary directory and lay out marker files like
 * `proc/vz` or `run/.containerenv` beneath it.
 *
 * @example
 * ```typescript
 * const context = new Context({ root: "/tmp/fake-root", platform: "linux" });
 * context.resolve("/run/.containerenv"); // "/tmp/fake-root/run/.containerenv"
 * ```
 */
export class Context {
  readonly root: string;
  readonly platform: NodeJS.Platform;
  readonly env: Readonly<Record<string, string | undefined>>;

  constructor(options: ContextOptions = {}) {
    this.root = path.resolve(options.root ?? "/");
    this.platform = options.platform ?? process.platform;
    this.env = options.env ?? process.env;
  }

  /**
   * Map a logical absolute path into the context's filesystem.
   */
  resolve(logicalPath: string): string {
    return path.join(this.root, logicalPath);
  }

  exists(logicalPath: string): boolean {
    return fs.existsSync(this.resolve(logicalPath));
  }

  /**
   * Read a whole file as UTF-8 text, capturing any I/O failure.
   */
  tryReadText(logicalPath: string): Result<string, ProbeReadError> {
    const resolved = this.resolve(logicalPath);
    return mapErr(
      tryCatch(() => fs.readFileSync(resolved, "utf-8")),
      (error) => new ProbeReadError(resolved, error)
    );
  }

  /**
   * Read a whole file as UTF-8 text; undefined on any I/O failure.
   */
  readText(logicalPath: string): string | undefined {
    const result = this.tryReadText(logicalPath);
    return result.ok ? result.value : undefined;
  }
}
