/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { Config, PartialConfig } from "../types";
import { ConfigSchema, PartialConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (XDG base directories on Linux)
const paths = envPaths("learn-dl", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/learn-dl or ~/.config/learn-dl
 * - macOS: ~/Library/Preferences/learn-dl
 * - Windows: %APPDATA%\learn-dl
 */
function getConfigDirectory(): string {
  return paths.config;
}

export interface ConfigError {
  path: string;
  error: unknown;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<Config> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return ConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial configuration file with Zod validation
 * Throws error if config is invalid
 */
async function loadPartialConfig(configPath: string): Promise<PartialConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialConfigSchema.parse(JSON.parse(content));
}

/**
 * Deep merge two configs (one level of nesting)
 */
export function mergeConfig(base: Config, override: PartialConfig): Config {
  return {
    api: { ...base.api, ...override.api },
    download: { ...base.download, ...override.download },
    cleanup: { ...base.cleanup, ...override.cleanup },
    storage: { ...base.storage, ...override.storage },
    markdown: { ...base.markdown, ...override.markdown },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: Config;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * Files that fail to load or validate are skipped and reported in `errors`
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
