/**
 * Caller-facing backup operations
 */

import * as path from "node:path";
import { normalizeMaxBackups } from "../config/validator";
import type { ArchiveInspection, ArchiveResult, BackupListing, ConfkeeperConfig } from "../types";
import { createLogger } from "../utils/logger";
import { createBackup } from "./backup/archive-creator";
import { inspectBackup, listBackups } from "./catalog";
import { restoreBackup } from "./restore";
import { downloadBackup, uploadBackup } from "./transfer";

const log = createLogger("service");

export interface BackupServiceOptions {
  /** Base configuration root */
  root: string;
  /** Directory holding the archives; relative paths resolve against root */
  backupDirectory: string;
  /** Sources used when a backup call names none */
  sources: readonly string[];
  /** Retention cap; anything that is not a non-negative integer is ignored */
  maxBackups?: unknown;
  /** Deflate level, 0-9 */
  compression?: number;
}

/**
 * Holds the configured roots and retention cap, and exposes the engine
 * operations with those filled in. Calls against one backup directory are not
 * serialized; callers that may overlap must queue them.
 */
export class BackupService {
  readonly root: string;
  readonly backupDir: string;
  readonly defaultSources: readonly string[];
  readonly maxBackups: number;
  private readonly compression: number;

  constructor(options: BackupServiceOptions) {
    this.root = path.resolve(options.root);
    this.backupDir = path.resolve(this.root, options.backupDirectory);
    this.defaultSources = [...options.sources];
    this.maxBackups = normalizeMaxBackups(options.maxBackups);
    this.compression = options.compression ?? 6;
  }

  static fromConfig(config: ConfkeeperConfig): BackupService {
    return new BackupService({
      root: config.root,
      backupDirectory: config.backupDirectory,
      sources: config.sources,
      maxBackups: config.maxBackups,
      compression: config.archive.compression,
    });
  }

  /**
   * Archive `paths`, or the default sources when none are given.
   * Resolves to null when there is nothing to back up.
   */
  async backupNow(paths?: readonly string[]): Promise<ArchiveResult | null> {
    const sources = paths && paths.length > 0 ? [...paths] : [...this.defaultSources];
    if (sources.length === 0) {
      log.warn("No sources provided for backup");
      return null;
    }

    return createBackup(sources, this.root, {
      backupDir: this.backupDir,
      maxBackups: this.maxBackups,
      compression: this.compression,
    });
  }

  async downloadBackup(name: string, destination: string, overwrite = false): Promise<string> {
    return downloadBackup(name, destination, {
      backupDir: this.backupDir,
      baseRoot: this.root,
      overwrite,
    });
  }

  async uploadBackup(source: string, name?: string, overwrite = false): Promise<string> {
    return uploadBackup(source, {
      backupDir: this.backupDir,
      baseRoot: this.root,
      name,
      overwrite,
    });
  }

  async restoreBackup(
    name: string,
    targets?: readonly string[],
    overwrite = false,
  ): Promise<string[]> {
    return restoreBackup(name, {
      backupDir: this.backupDir,
      baseRoot: this.root,
      targets: targets ? [...targets] : undefined,
      overwrite,
    });
  }

  async listBackups(): Promise<BackupListing[]> {
    return listBackups(this.backupDir);
  }

  async inspectBackup(name: string): Promise<ArchiveInspection> {
    return inspectBackup(name, this.backupDir);
  }
}
