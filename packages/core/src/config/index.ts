export { CONFIG_DEFAULTS, CONTAINER_DEFAULTS } from "./defaults.js";
export type { ConfigError, ConfigErrorCode, LoadConfigOptions } from "./loader.js";
export {
  deepMerge,
  loadConfig,
  parseEnvConfig,
  readTomlFile,
  resolveConfigPath,
} from "./loader.js";
export type { ContainerConfig, PromptConfig, RawPromptConfig } from "./schema.js";
export {
  ContainerConfigSchema,
  defaultConfig,
  LogLevelSchema,
  PromptConfigSchema,
} from "./schema.js";
