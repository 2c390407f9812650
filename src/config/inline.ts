/**
 * Inline configuration parsing and merging utilities
 */

import * as path from "node:path";
import type { ConfkeeperConfig } from "../types";
import { DEFAULT_CONFIG } from "./defaults";
import { resolvePaths } from "./resolver";
import { ConfigError, normalizeMaxBackups } from "./validator";

/**
 * Inline configuration options that can be passed via CLI flags
 */
export interface InlineConfigOptions {
  /** Base configuration root */
  root?: string;
  /** Backup directory, relative to root */
  backupDir?: string;
  /** Default sources (can be repeated) */
  source?: string[];
  /** Retention cap, raw from the command line */
  maxBackups?: string;
  /** Compression level (0-9) */
  compression?: number;
}

/**
 * CLI option definitions for inline config (for parseArgs)
 */
export const INLINE_CONFIG_OPTIONS = {
  root: { type: "string" as const },
  "backup-dir": { type: "string" as const },
  source: { type: "string" as const, multiple: true },
  "max-backups": { type: "string" as const },
  compression: { type: "string" as const },
} as const;

/**
 * Shape of the inline option values `parseArgs` produces
 */
export interface InlineOptionValues {
  root?: string;
  "backup-dir"?: string;
  source?: string[];
  "max-backups"?: string;
  compression?: string;
}

/**
 * Extract inline config options from parsed CLI values
 */
export function extractInlineOptions(values: InlineOptionValues): InlineConfigOptions {
  return {
    root: values.root,
    backupDir: values["backup-dir"],
    source: values.source,
    maxBackups: values["max-backups"],
    compression: values.compression ? Number(values.compression) : undefined,
  };
}

/**
 * Check if any inline config options were provided
 */
export function hasInlineOptions(options: InlineConfigOptions): boolean {
  return !!(
    options.root ||
    options.backupDir ||
    (options.source && options.source.length > 0) ||
    options.maxBackups !== undefined ||
    options.compression !== undefined
  );
}

function isValidCompression(level: number): boolean {
  return Number.isInteger(level) && level >= 0 && level <= 9;
}

/**
 * Merge inline config options into an existing config. A relative
 * --backup-dir resolves against the resulting root.
 */
export function mergeInlineConfig(
  baseConfig: ConfkeeperConfig,
  inlineOptions: InlineConfigOptions,
): ConfkeeperConfig {
  if (inlineOptions.compression !== undefined && !isValidCompression(inlineOptions.compression)) {
    throw new ConfigError("--compression must be an integer between 0 and 9");
  }

  const root = inlineOptions.root ? path.resolve(inlineOptions.root) : baseConfig.root;

  return resolvePaths({
    ...baseConfig,
    root,
    backupDirectory: inlineOptions.backupDir ?? baseConfig.backupDirectory,
    sources:
      inlineOptions.source && inlineOptions.source.length > 0
        ? inlineOptions.source
        : baseConfig.sources,
    maxBackups:
      inlineOptions.maxBackups !== undefined
        ? normalizeMaxBackups(inlineOptions.maxBackups)
        : baseConfig.maxBackups,
    archive: {
      compression: inlineOptions.compression ?? baseConfig.archive.compression,
    },
  });
}

/**
 * Validation result for inline options
 */
export interface InlineValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Check if inline options are sufficient to run without a config file.
 * Requires at minimum an explicit --root.
 */
export function validateInlineOptionsForConfigFreeMode(
  options: InlineConfigOptions,
): InlineValidationResult {
  const errors: string[] = [];

  if (!options.root) {
    errors.push("--root is required when running without a config file");
  }

  if (options.compression !== undefined && !isValidCompression(options.compression)) {
    errors.push("--compression must be an integer between 0 and 9");
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Check if inline options can support config-free mode
 */
export function canRunWithoutConfigFile(options: InlineConfigOptions): boolean {
  return validateInlineOptionsForConfigFreeMode(options).valid;
}

/**
 * Create a complete config from inline options only (no base config file).
 */
export function createConfigFromInlineOptions(options: InlineConfigOptions): ConfkeeperConfig {
  const validation = validateInlineOptionsForConfigFreeMode(options);
  if (!validation.valid || !options.root) {
    throw new Error(validation.errors.join("\n"));
  }

  return mergeInlineConfig({ ...DEFAULT_CONFIG, root: path.resolve(options.root) }, options);
}
