// Factory
export type { CreateLoggerOptions } from "./factory.js";
export { createLogger } from "./factory.js";
export { Logger } from "./logger.js";
// Transports
export type { ConsoleTransportOptions } from "./transports/console.js";
export { ConsoleTransport } from "./transports/console.js";
export type { LogEntry, LoggerOptions, LogLevel, LogTransport } from "./types.js";
export { LOG_LEVEL_COLORS, LOG_LEVEL_PRIORITY } from "./types.js";
