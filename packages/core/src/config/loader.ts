import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as TOML from "@iarna/toml";
import { Err, Ok, type Result } from "@shellmark/shared";
import { CONFIG_DEFAULTS } from "./defaults.js";
import { type PromptConfig, PromptConfigSchema } from "./schema.js";

// ============================================
// Configuration Loader Module
// ============================================

/**
 * Error types for configuration loading operations
 */
export type ConfigErrorCode = "FILE_NOT_FOUND" | "PARSE_ERROR" | "VALIDATION_ERROR" | "READ_ERROR";

/**
 * Configuration error with code and context
 */
export interface ConfigError {
  code: ConfigErrorCode;
  message: string;
  path?: string;
  cause?: unknown;
}

/**
 * Options for loadConfig function
 */
export interface LoadConfigOptions {
  /** Explicit config file; wins over the environment and the default location */
  path?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: Readonly<Record<string, string | undefined>>;
  /** Skip loading environment variables */
  skipEnv?: boolean;
}

type RawTable = Record<string, unknown>;

/**
 * Resolve which config file to read.
 *
 * Order: explicit path, `SHELLMARK_CONFIG`, `~/.config/shellmark.toml`.
 */
export function resolveConfigPath(
  explicitPath?: string,
  env: Readonly<Record<string, string | undefined>> = process.env
): string {
  if (explicitPath) {
    return path.resolve(explicitPath);
  }
  const fromEnv = env[CONFIG_DEFAULTS.configEnvVar];
  if (fromEnv !== undefined && fromEnv !== "") {
    return path.resolve(fromEnv);
  }
  return path.join(os.homedir(), ...CONFIG_DEFAULTS.configFile);
}

// ============================================
// parseEnvConfig
// ============================================

/**
 * Environment variable to config path mappings
 */
const ENV_MAPPINGS: Record<string, string[]> = {
  SHELLMARK_LOG_LEVEL: ["log_level"],
};

function isPlainObject(value: unknown): value is RawTable {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.prototype.toString.call(value) === "[object Object]"
  );
}

/**
 * Set a nested value in an object using a path array
 */
function setNestedValue(obj: RawTable, keys: string[], value: unknown): void {
  let current = obj;
  for (const key of keys.slice(0, -1)) {
    const next = current[key];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: RawTable = {};
      current[key] = created;
      current = created;
    }
  }
  const lastKey = keys[keys.length - 1];
  if (lastKey !== undefined) {
    current[lastKey] = value;
  }
}

/**
 * Parse SHELLMARK_* environment variables into a raw (TOML-shaped) table.
 *
 * @example
 * ```typescript
 * // With SHELLMARK_LOG_LEVEL=debug set:
 * parseEnvConfig(); // { log_level: "debug" }
 * ```
 */
export function parseEnvConfig(
  env: Readonly<Record<string, string | undefined>> = process.env
): RawTable {
  const result: RawTable = {};

  for (const [envVar, configPath] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envVar];
    if (value !== undefined && value !== "") {
      setNestedValue(result, configPath, value);
    }
  }

  return result;
}

// ============================================
// deepMerge
// ============================================

/**
 * Deep merge raw tables. Later sources override earlier ones.
 * Arrays are replaced (not concatenated).
 * undefined values don't overwrite existing values.
 */
export function deepMerge(...sources: RawTable[]): RawTable {
  const result: RawTable = {};

  for (const source of sources) {
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;

      const targetValue = result[key];
      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        result[key] = deepMerge(targetValue, sourceValue);
      } else {
        result[key] = sourceValue;
      }
    }
  }

  return result;
}

// ============================================
// loadConfig
// ============================================

/**
 * Read and parse a TOML config file
 */
export function readTomlFile(filePath: string): Result<RawTable, ConfigError> {
  try {
    if (!fs.existsSync(filePath)) {
      return Err({
        code: "FILE_NOT_FOUND",
        message: `Config file not found: ${filePath}`,
        path: filePath,
      });
    }

    const content = fs.readFileSync(filePath, "utf-8");
    return Ok(TOML.parse(content));
  } catch (error) {
    if (error instanceof Error && error.name === "TomlError") {
      return Err({
        code: "PARSE_ERROR",
        message: `Failed to parse TOML: ${error.message}`,
        path: filePath,
        cause: error,
      });
    }
    return Err({
      code: "READ_ERROR",
      message: `Failed to read config file: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }
}

/**
 * Load configuration with cascading priority.
 *
 * Load order (later overrides earlier):
 * 1. Schema defaults
 * 2. Config file (see {@link resolveConfigPath}); a missing file is not an error
 * 3. Environment variables (unless skipEnv)
 *
 * @example
 * ```typescript
 * const result = loadConfig();
 * if (result.ok) {
 *   console.log(result.value.container.symbol);
 * } else {
 *   logger.warn(result.error.message);
 * }
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<PromptConfig, ConfigError> {
  const env = options.env ?? process.env;
  const layers: RawTable[] = [];

  const filePath = resolveConfigPath(options.path, env);
  const fileResult = readTomlFile(filePath);
  if (fileResult.ok) {
    layers.push(fileResult.value);
  } else if (fileResult.error.code !== "FILE_NOT_FOUND") {
    return fileResult;
  }

  if (!options.skipEnv) {
    const envConfig = parseEnvConfig(env);
    if (Object.keys(envConfig).length > 0) {
      layers.push(envConfig);
    }
  }

  // Validate and apply defaults via schema
  const parseResult = PromptConfigSchema.safeParse(deepMerge(...layers));

  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    return Err({
      code: "VALIDATION_ERROR",
      message: `Invalid configuration: ${issues}`,
      path: filePath,
      cause: parseResult.error,
    });
  }

  return Ok(parseResult.data);
}
