/**
 * Configuration Loader
 * Loads and merges configuration from defaults, user config and a custom file
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  ConversionConfig,
  PartialConversionConfig,
  ConfigError,
} from "../types";
import {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "../types";
import { fileExists } from "./fs";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("pdf-longshot", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/pdf-longshot or ~/.config/pdf-longshot
 * - macOS: ~/Library/Preferences/pdf-longshot
 * - Windows: %APPDATA%\pdf-longshot\Config
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<ConversionConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return ConversionConfigSchema.parse(JSON.parse(content));
}

/**
 * Read and validate a partial config file
 * Throws if the file is unreadable, not JSON, or fails the schema
 */
async function loadPartialConfig(
  configPath: string,
): Promise<PartialConversionConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialConversionConfigSchema.parse(JSON.parse(content));
}

/**
 * Load user configuration from OS-specific directory
 * Returns null when the user has not created one
 */
async function loadUserConfig(): Promise<PartialConversionConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!(await fileExists(userConfigPath))) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

/**
 * Merge section by section so a partial override keeps the other keys
 */
export function mergeConfig(
  base: ConversionConfig,
  override: PartialConversionConfig,
): ConversionConfig {
  return {
    render: { ...base.render, ...override.render },
    stitch: { ...base.stitch, ...override.stitch },
    output: { ...base.output, ...override.output },
    download: { ...base.download, ...override.download },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: ConversionConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A config file that fails to load or validate is skipped and reported in `errors`
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    const userConfig = await loadUserConfig();
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error });
  }

  if (custom) {
    try {
      const customConfig = await loadPartialConfig(custom);
      config = mergeConfig(config, customConfig);
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
