/**
 * Configuration path resolution
 */

import * as path from "node:path";
import type { ConfkeeperConfig } from "../types";

/**
 * Root named in a config file, resolved against the file's directory.
 * Without one, the directory holding the config file is the root.
 */
export function resolveRoot(root: unknown, configPath: string): string {
  const configDir = path.dirname(path.resolve(configPath));
  return typeof root === "string" ? path.resolve(configDir, root) : configDir;
}

/**
 * Resolve the backup directory against the root.
 */
export function resolvePaths(config: ConfkeeperConfig): ConfkeeperConfig {
  return {
    ...config,
    root: path.resolve(config.root),
    backupDirectory: path.resolve(config.root, config.backupDirectory),
  };
}
