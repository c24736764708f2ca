import { parse as parseToml } from "@iarna/toml";
import { readFileSync } from "node:fs";
import { ConfigSchema, type Config } from "./schema";

/**
 * Clean TOML parsed object by removing Symbol properties
 * TOML parser adds internal Symbol properties that Zod cannot validate
 */
function cleanTomlObject(value: unknown): unknown {
  if (value === null || typeof value !== "object") {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(cleanTomlObject);
  }

  // Object.entries only yields string keys, Symbol properties are dropped
  const cleaned: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    cleaned[key] = cleanTomlObject(entry);
  }
  return cleaned;
}

/**
 * Parse and validate TOML configuration content
 * @param content Raw TOML text
 * @returns Validated configuration with defaults applied
 */
export function parseConfig(content: string): Config {
  return ConfigSchema.parse(cleanTomlObject(parseToml(content)));
}

/**
 * Load and parse TOML configuration file
 * @param path Path to the TOML configuration file
 * @returns Parsed and validated configuration
 */
export function loadConfig(path: string = "config.toml"): Config {
  try {
    return parseConfig(readFileSync(path, "utf-8"));
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(`Failed to load config from ${path}: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Global configuration instance
 * Only the dataset builder initializes it, the resolver runs without one
 */
let globalConfig: Config | null = null;

/**
 * Initialize global configuration
 * @param config The loaded configuration, or null to clear it
 */
export function setConfig(config: Config | null): void {
  globalConfig = config;
}

/**
 * Get the global configuration
 * @throws Error if config is not initialized
 */
export function getConfig(): Config {
  if (!globalConfig) {
    throw new Error("Configuration not initialized. Call setConfig() first.");
  }
  return globalConfig;
}

/**
 * Get the global configuration if one was set
 */
export function tryGetConfig(): Config | null {
  return globalConfig;
}

// Re-export types
export type {
  Config,
  DatasetConfig,
  LogLevel,
  LoggingConfig,
} from "./schema";
