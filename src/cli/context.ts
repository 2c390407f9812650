/**
 * Config resolution shared by every command
 */

import {
  ConfigError,
  canRunWithoutConfigFile,
  createConfigFromInlineOptions,
  extractInlineOptions,
  findAndLoadConfig,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineOptionValues,
  mergeInlineConfig,
  validateInlineOptionsForConfigFreeMode,
} from "../config/loader";
import { BackupService } from "../core/service";
import type { ConfkeeperConfig } from "../types";
import { isBackupError } from "../utils/errors";
import { setLogLevel } from "../utils/logger";
import { ui } from "./ui";

export const COMMON_OPTIONS = {
  config: { type: "string" as const, short: "c" },
  verbose: { type: "boolean" as const, short: "v", default: false },
  help: { type: "boolean" as const, short: "h", default: false },
  ...INLINE_CONFIG_OPTIONS,
} as const;

export interface CommonValues extends InlineOptionValues {
  config?: string;
  verbose?: boolean;
}

export const COMMON_HELP = `  -c, --config <path>     Path to config file (default: ./confkeeper.config.yaml)
      --root <path>       Base configuration root
      --backup-dir <path> Backup directory, relative to the root
      --source <path>     Default source, relative to the root (can be repeated)
      --max-backups <n>   Keep at most n system backups (0 = no limit)
      --compression <0-9> Deflate level (default: 6)
  -v, --verbose           Verbose output
  -h, --help              Show this help message`;

/**
 * Load the config file, apply inline overrides, and fall back to inline
 * options alone when no file exists. Returns null after reporting why
 * neither worked.
 */
export async function resolveConfig(values: CommonValues): Promise<ConfkeeperConfig | null> {
  const inlineOptions = extractInlineOptions(values);
  let config: ConfkeeperConfig | null = null;

  try {
    config = await findAndLoadConfig(values.config);
  } catch (error) {
    if (!(error instanceof ConfigError) || values.config) {
      throw error;
    }
  }

  if (config) {
    config = hasInlineOptions(inlineOptions) ? mergeInlineConfig(config, inlineOptions) : config;
  } else {
    if (!canRunWithoutConfigFile(inlineOptions)) {
      const validation = validateInlineOptionsForConfigFreeMode(inlineOptions);
      ui.error("No config file found and inline options are insufficient:");
      for (const err of validation.errors) {
        ui.message(`  - ${err}`);
      }
      return null;
    }
    config = createConfigFromInlineOptions(inlineOptions);
  }

  setLogLevel(values.verbose ? "debug" : config.logLevel);
  return config;
}

export async function createService(values: CommonValues): Promise<BackupService | null> {
  const config = await resolveConfig(values);
  return config ? BackupService.fromConfig(config) : null;
}

/**
 * Print a failure the way every command does and return the exit code.
 */
export function reportFailure(label: string, error: unknown, verbose: boolean | undefined): number {
  const message = error instanceof Error ? error.message : String(error);
  const kind = isBackupError(error) ? ` (${error.kind})` : "";
  ui.error(`${label} failed${kind}: ${message}`);
  if (verbose) {
    console.error(error);
  }
  return 1;
}
