/**
 * Configuration type definitions for confkeeper
 */

import type { LogLevel } from "../utils/logger";

export interface ArchiveConfig {
  /** Deflate level, 0-9 (default: 6) */
  compression: number;
}

export interface ConfkeeperConfig {
  /** Base configuration root; sources, restore targets and relative transfer paths resolve against it */
  root: string;
  /** Directory holding the archives, flat */
  backupDirectory: string;
  /** Default sources, relative to root */
  sources: string[];
  /** Retention cap for system-generated archives; 0 disables pruning */
  maxBackups: number;
  archive: ArchiveConfig;
  logLevel: LogLevel;
}
