/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import { pathExists } from "./path-exists";
import type {
  CalibrationConfig,
  PartialCalibrationConfig,
} from "../types/config";
import {
  CalibrationConfigSchema,
  PartialCalibrationConfigSchema,
} from "../types/config";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("calib-builder", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/calib-builder or ~/.config/calib-builder
 * - macOS: ~/Library/Preferences/calib-builder
 * - Windows: %APPDATA%\calib-builder
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
export async function loadDefaultConfig(): Promise<CalibrationConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return CalibrationConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial configuration file with Zod validation
 * Throws if the file cannot be read, parsed or validated
 */
async function loadPartialConfig(
  configPath: string,
): Promise<PartialCalibrationConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialCalibrationConfigSchema.parse(JSON.parse(content));
}

/**
 * Deep merge two objects
 */
export function mergeConfig(
  base: CalibrationConfig,
  override: PartialCalibrationConfig,
): CalibrationConfig {
  return {
    input: { ...base.input, ...override.input },
    output: { ...base.output, ...override.output },
    sampling: { ...base.sampling, ...override.sampling },
    image: { ...base.image, ...override.image },
    concurrency: override.concurrency ?? base.concurrency,
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: CalibrationConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * Files that fail to load are reported in `errors` and left out of the merge
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (await pathExists(userConfigPath, "file")) {
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
