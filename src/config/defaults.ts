/**
 * Default configuration values
 */

import type { ConfkeeperConfig } from "../types";

export const CONFIG_FILE_NAMES = [
  "confkeeper.config.yaml",
  "confkeeper.config.yml",
  "confkeeper.config.json",
] as const;

export const DEFAULT_BACKUP_DIRECTORY = "backups";

export const DEFAULT_SOURCES: readonly string[] = [
  "configuration.yaml",
  "automations.yaml",
  "scripts.yaml",
  "blueprints",
  "automations",
  "scripts",
];

/**
 * Everything except `root`, which defaults to the config file's directory.
 */
export const DEFAULT_CONFIG: Omit<ConfkeeperConfig, "root"> = {
  backupDirectory: DEFAULT_BACKUP_DIRECTORY,
  sources: [...DEFAULT_SOURCES],
  maxBackups: 0,
  archive: {
    compression: 6,
  },
  logLevel: "info",
};

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target. Arrays are replaced,
 * not concatenated; undefined in source leaves the target value.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
