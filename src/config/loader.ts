/**
 * Configuration file loading
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { ConfkeeperConfig } from "../types";
import { getErrorCode } from "../utils/errors";
import { CONFIG_FILE_NAMES, DEFAULT_CONFIG, deepMerge, isPlainObject } from "./defaults";
import { resolvePaths, resolveRoot } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

// Re-export inline config utilities
export {
  canRunWithoutConfigFile,
  createConfigFromInlineOptions,
  extractInlineOptions,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  type InlineOptionValues,
  type InlineValidationResult,
  mergeInlineConfig,
  validateInlineOptionsForConfigFreeMode,
} from "./inline";
export { ConfigError } from "./validator";

/**
 * Load and parse a config file
 */
export async function loadConfig(configPath: string): Promise<ConfkeeperConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.promises.readFile(absolutePath, "utf8");
  } catch (error) {
    if (getErrorCode(error) === "ENOENT") {
      throw new ConfigError(`Config file not found: ${absolutePath}`);
    }
    throw error;
  }

  const ext = path.extname(absolutePath).toLowerCase();
  const parsed = parseConfigContent(content, ext) ?? {};

  if (!isPlainObject(parsed)) {
    throw new ConfigError("Config must be an object");
  }

  const merged = deepMerge({ ...DEFAULT_CONFIG }, parsed);
  const config = validateConfig(merged, resolveRoot(parsed.root, absolutePath));

  return resolvePaths(config);
}

function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    try {
      if (fs.statSync(configPath).isFile()) {
        return configPath;
      }
    } catch {
      // Not there, try the next name
    }
  }

  return null;
}

/**
 * Find and load a config file
 */
export async function findAndLoadConfig(configPath?: string): Promise<ConfkeeperConfig> {
  if (configPath) {
    return loadConfig(configPath);
  }

  const found = findConfigFile();
  if (!found) {
    throw new ConfigError(
      "No config file found. Create confkeeper.config.yaml or specify --config path",
    );
  }

  return loadConfig(found);
}
