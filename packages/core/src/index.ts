// ============================================
// Shellmark Core
// ============================================

/**
 * @module @shellmark/core
 *
 * Prompt segment engine: execution context, configuration, template
 * formatter, logging, and the built-in modules.
 */

// ============================================
// Errors
// ============================================
export type { FormatErrorKind, ShellmarkErrorOptions } from "./errors/index.js";
export { FormatError, isShellmarkError, ProbeReadError, ShellmarkError } from "./errors/index.js";

// ============================================
// Logger
// ============================================
export type {
  ConsoleTransportOptions,
  CreateLoggerOptions,
  LogEntry,
  LoggerOptions,
  LogLevel,
  LogTransport,
} from "./logger/index.js";
export {
  ConsoleTransport,
  createLogger,
  LOG_LEVEL_COLORS,
  LOG_LEVEL_PRIORITY,
  Logger,
} from "./logger/index.js";

// ============================================
// Configuration
// ============================================
export type {
  ConfigError,
  ConfigErrorCode,
  ContainerConfig,
  LoadConfigOptions,
  PromptConfig,
  RawPromptConfig,
} from "./config/index.js";
export {
  CONFIG_DEFAULTS,
  CONTAINER_DEFAULTS,
  ContainerConfigSchema,
  deepMerge,
  defaultConfig,
  loadConfig,
  LogLevelSchema,
  parseEnvConfig,
  PromptConfigSchema,
  readTomlFile,
  resolveConfigPath,
} from "./config/index.js";

// ============================================
// Context
// ============================================
export type { ContextOptions } from "./context/index.js";
export { Context } from "./context/index.js";

// ============================================
// Formatter
// ============================================
export type {
  ParsedTemplate,
  Resolution,
  Segment,
  StyleWord,
  TemplateResolvers,
  TemplateToken,
} from "./formatter/index.js";
export {
  bindMeta,
  formatTemplate,
  parseTemplate,
  renderTemplate,
  segmentsToAnsi,
  segmentsToText,
} from "./formatter/index.js";

// ============================================
// Modules
// ============================================
export type { ContainerProbe, Module, ModuleRenderer, ProbeVerdict } from "./modules/index.js";
export {
  CONTAINER_PROBES,
  CONTAINERENV_FALLBACK_NAME,
  containerModule,
  detectContainer,
  formatContainer,
  listModules,
  MODULES,
  parseContainerEnv,
  renderModule,
} from "./modules/index.js";
