import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { type LogEntry, Logger, type LogTransport } from "@shellmark/core";

export interface Sandbox {
  readonly root: string;
  readonly configPath: string;
  readonly entries: LogEntry[];
  readonly logger: Logger;
  write(logical: string, content: string): void;
  cleanup(): void;
}

/**
 * A fake filesystem root plus a config location beside it, and a logger
 * that records every entry.
 */
export function createSandbox(): Sandbox {
  const base = fs.mkdtempSync(path.join(os.tmpdir(), "shellmark-cli-"));
  const root = path.join(base, "root");
  fs.mkdirSync(root);

  const entries: LogEntry[] = [];
  const transport: LogTransport = {
    log(entry) {
      entries.push(entry);
    },
  };

  return {
    root,
    configPath: path.join(base, "shellmark.toml"),
    entries,
    logger: new Logger({ level: "trace", transports: [transport] }),
    write(logical, content) {
      const target = path.join(root, logical);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, content);
    },
    cleanup() {
      fs.rmSync(base, { recursive: true, force: true });
    },
  };
}
