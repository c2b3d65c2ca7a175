/**
 * Centralized configuration defaults.
 * All hardcoded values should be defined here and imported elsewhere.
 */

export const CONTAINER_DEFAULTS = {
  disabled: false,
  /** Symbol, then the name in brackets, all in the module style */
  format: "[$symbol \\[$name\\]]($style) ",
  symbol: "⬢",
  style: "red bold dimmed",
  useContainerName: false,
} as const;

export const CONFIG_DEFAULTS = {
  logLevel: "warn",
  /** Environment variable naming an explicit config file */
  configEnvVar: "SHELLMARK_CONFIG",
  /** Config file location relative to the home directory */
  configFile: [".config", "shellmark.toml"],
} as const;
