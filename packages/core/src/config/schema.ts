import { z } from "zod";
import { CONFIG_DEFAULTS, CONTAINER_DEFAULTS } from "./defaults.js";

// ============================================
// Module Configuration Schemas
// ============================================

/**
 * `[container]` table. TOML keys are snake_case; the parsed value is camelCase.
 */
export const ContainerConfigSchema = z
  .object({
    disabled: z.boolean().optional().default(CONTAINER_DEFAULTS.disabled),
    format: z.string().optional().default(CONTAINER_DEFAULTS.format),
    symbol: z.string().optional().default(CONTAINER_DEFAULTS.symbol),
    style: z.string().optional().default(CONTAINER_DEFAULTS.style),
    use_container_name: z.boolean().optional().default(CONTAINER_DEFAULTS.useContainerName),
  })
  .transform((raw) => ({
    disabled: raw.disabled,
    format: raw.format,
    symbol: raw.symbol,
    style: raw.style,
    useContainerName: raw.use_container_name,
  }));

export type ContainerConfig = Readonly<z.output<typeof ContainerConfigSchema>>;

// ============================================
// Log Level Schema
// ============================================

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error"]);

// ============================================
// Complete Configuration Schema
// ============================================

export const PromptConfigSchema = z
  .object({
    log_level: LogLevelSchema.optional().default(CONFIG_DEFAULTS.logLevel),
    container: ContainerConfigSchema.optional().default({}),
  })
  .transform((raw) => ({
    logLevel: raw.log_level,
    container: raw.container,
  }));

export type PromptConfig = Readonly<z.output<typeof PromptConfigSchema>>;

/**
 * Raw config shape as written in TOML (before defaults are applied)
 */
export type RawPromptConfig = z.input<typeof PromptConfigSchema>;

/**
 * Configuration with every default applied.
 */
export function defaultConfig(): PromptConfig {
  return PromptConfigSchema.parse({});
}
