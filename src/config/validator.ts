/**
 * Configuration validation
 */

import type { ConfkeeperConfig } from "../types";
import { isLogLevel, logger } from "../utils/logger";
import { isPlainObject } from "./defaults";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (config: Record<string, unknown>) => void;

const validators: Record<string, Validator> = {
  root: (c) => {
    if (c.root !== undefined && (typeof c.root !== "string" || c.root === "")) {
      throw new ConfigError("root must be a non-empty string");
    }
  },

  backupDirectory: (c) => {
    if (typeof c.backupDirectory !== "string" || c.backupDirectory === "") {
      throw new ConfigError("backupDirectory must be a non-empty string");
    }
  },

  sources: (c) => {
    if (!Array.isArray(c.sources)) {
      throw new ConfigError("sources must be a list of paths");
    }
    c.sources.forEach((source, i) => {
      if (typeof source !== "string" || source === "") {
        throw new ConfigError(`sources[${i}] must be a non-empty string`);
      }
    });
  },

  archive: (c) => {
    if (!isPlainObject(c.archive)) {
      throw new ConfigError("archive must be an object");
    }
    const { compression } = c.archive;
    if (
      typeof compression !== "number" ||
      !Number.isInteger(compression) ||
      compression < 0 ||
      compression > 9
    ) {
      throw new ConfigError("archive.compression must be an integer between 0 and 9");
    }
  },

  logLevel: (c) => {
    if (!isLogLevel(c.logLevel)) {
      throw new ConfigError("logLevel must be one of debug, info, warn, error");
    }
  },
};

/**
 * Coerce a configured retention cap. Absent means no limit; values that are
 * not integers are ignored with a warning; negatives clamp to 0.
 */
export function normalizeMaxBackups(value: unknown): number {
  if (value === undefined || value === null) {
    return 0;
  }

  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.max(0, Math.trunc(value));
  }

  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    return Math.max(0, Number.parseInt(value, 10));
  }

  logger.warn(`Invalid maxBackups value ${String(value)}; ignoring`);
  return 0;
}

/**
 * Validate a merged configuration object and return it typed.
 * `root` must already be resolved by the caller.
 */
export function validateConfig(config: unknown, root: string): ConfkeeperConfig {
  if (!isPlainObject(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }

  const { backupDirectory, sources, archive, logLevel } = config;
  if (
    typeof backupDirectory !== "string" ||
    !Array.isArray(sources) ||
    !isPlainObject(archive) ||
    typeof archive.compression !== "number" ||
    !isLogLevel(logLevel)
  ) {
    throw new ConfigError("Config failed validation");
  }

  return {
    root,
    backupDirectory,
    sources: sources.filter((source): source is string => typeof source === "string"),
    maxBackups: normalizeMaxBackups(config.maxBackups),
    archive: { compression: archive.compression },
    logLevel,
  };
}
