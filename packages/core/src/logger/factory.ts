import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import type { LogLevel } from "./types.js";

/**
 * Options for creating a logger via createLogger factory.
 */
export interface CreateLoggerOptions {
  /** Logger name for identification (default: 'shellmark') */
  name?: string;
  /** Minimum log level (default: 'warn') */
  level?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Enable colored console output (auto-detected when omitted) */
  colors?: boolean;
  /** Include timestamps in console output (default: true) */
  timestamps?: boolean;
}

/**
 * Factory function to create a Logger with the usual console transport.
 *
 * The prompt renders on every shell prompt, so the default level is `warn`.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug' });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const logger = new Logger({
    level: options.level ?? "warn",
    context: { logger: options.name ?? "shellmark" },
  });

  if (options.console ?? true) {
    logger.addTransport(
      new ConsoleTransport({
        colors: options.colors,
        timestamps: options.timestamps,
      })
    );
  }

  return logger;
}
