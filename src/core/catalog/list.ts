/**
 * Listing and inspection of stored archives
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Open } from "unzipper";
import type { ArchiveInspection, BackupListing } from "../../types";
import { computeFileChecksum } from "../../utils/crypto";
import { getErrorCode, toBackupError } from "../../utils/errors";
import { hasArchiveExtension, isManagedArchiveName } from "../../utils/naming";
import { resolveBackupFile } from "../restore/resolve-backup";

/**
 * Zip files directly inside the backup directory, sorted by name.
 * A backup directory that does not exist yet holds no backups.
 */
export async function listBackups(backupDir: string): Promise<BackupListing[]> {
  try {
    const dir = path.resolve(backupDir);
    let names: string[];
    try {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      names = entries
        .filter((entry) => entry.isFile() && hasArchiveExtension(entry.name))
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (getErrorCode(error) === "ENOENT") return [];
      throw error;
    }

    const listings: BackupListing[] = [];
    for (const name of names) {
      const filePath = path.join(dir, name);
      const stats = await fs.stat(filePath);
      listings.push({
        name,
        path: filePath,
        sizeBytes: stats.size,
        modifiedAt: stats.mtime,
        managed: isManagedArchiveName(name),
      });
    }
    return listings;
  } catch (error) {
    throw toBackupError(error);
  }
}

/**
 * Open a stored archive, list its file members and compute its checksum.
 */
export async function inspectBackup(name: string, backupDir: string): Promise<ArchiveInspection> {
  try {
    const archivePath = await resolveBackupFile(name, backupDir);
    const directory = await Open.file(archivePath);
    const members = directory.files
      .filter((entry) => entry.type !== "Directory" && !entry.path.endsWith("/"))
      .map((entry) => entry.path);

    const [stats, checksum] = await Promise.all([
      fs.stat(archivePath),
      computeFileChecksum(archivePath),
    ]);

    return {
      name: path.basename(archivePath),
      path: archivePath,
      sizeBytes: stats.size,
      checksum,
      members,
    };
  } catch (error) {
    throw toBackupError(error);
  }
}
