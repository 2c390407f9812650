/**
 * Retention policy logic
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { RetentionResult } from "../../types";
import { getErrorCode } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { isManagedArchiveName } from "../../utils/naming";

const log = createLogger("retention");

export interface PruneSelection {
  kept: string[];
  pruned: string[];
}

/**
 * Split managed archive names into the ones to keep and the oldest ones to
 * prune. Names sort chronologically because of the timestamp format.
 */
export function getPruneCandidates(names: string[], cap: number): PruneSelection {
  const managed = names.filter(isManagedArchiveName).sort();

  if (cap <= 0) {
    return { kept: managed, pruned: [] };
  }

  const excess = Math.max(0, managed.length - cap);
  return { kept: managed.slice(excess), pruned: managed.slice(0, excess) };
}

async function listArchiveFiles(backupDir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(backupDir, { withFileTypes: true });
    return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
  } catch (error) {
    if (getErrorCode(error) === "ENOENT") {
      return [];
    }
    throw error;
  }
}

/**
 * Delete the oldest system archives beyond `cap`. A failed deletion is logged
 * and the remaining candidates are still processed.
 */
export async function enforceRetention(backupDir: string, cap: number): Promise<RetentionResult> {
  const names = await listArchiveFiles(backupDir);
  const { kept, pruned } = getPruneCandidates(names, cap);
  const deleted: string[] = [];
  const failed: string[] = [];

  for (const name of pruned) {
    const archivePath = path.join(backupDir, name);
    try {
      await fs.unlink(archivePath);
      deleted.push(name);
      log.debug(`Removed old backup ${archivePath}`);
    } catch (error) {
      failed.push(name);
      log.warn(`Failed to remove old backup ${archivePath}`, error);
    }
  }

  if (deleted.length > 0) {
    log.info(`Pruned ${deleted.length} backup(s), keeping ${kept.length}`);
  }

  return { kept, deleted, failed };
}
