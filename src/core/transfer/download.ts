/**
 * Copy an archive out of the backup directory
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { AlreadyExistsError, toBackupError } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { hasTrailingSep, isDirectory, pathExists, resolveAgainst } from "../../utils/path";
import { resolveBackupFile } from "../restore/resolve-backup";
import { copyWithMetadata } from "./copy";

const log = createLogger("transfer");

export interface DownloadOptions {
  backupDir: string;
  /** Relative destinations resolve against this root */
  baseRoot: string;
  overwrite?: boolean;
}

/**
 * Work out the file a download writes to. A destination that is an existing
 * directory, or is spelled with a trailing separator, receives the archive
 * under its own name.
 */
export async function resolveDownloadTarget(
  destination: string,
  archiveName: string,
  baseRoot: string,
): Promise<string> {
  const resolved = resolveAgainst(destination, baseRoot);
  if (hasTrailingSep(destination) || (await isDirectory(resolved))) {
    return path.join(resolved, archiveName);
  }
  return resolved;
}

export async function downloadBackup(
  name: string,
  destination: string,
  options: DownloadOptions,
): Promise<string> {
  try {
    const archivePath = await resolveBackupFile(name, options.backupDir);
    const target = await resolveDownloadTarget(
      destination,
      path.basename(archivePath),
      options.baseRoot,
    );

    await fs.mkdir(path.dirname(target), { recursive: true });

    if (!options.overwrite && (await pathExists(target))) {
      throw new AlreadyExistsError(`Destination already exists: ${target}`);
    }

    await copyWithMetadata(archivePath, target);
    log.info(`Downloaded ${path.basename(archivePath)} to ${target}`);

    return target;
  } catch (error) {
    throw toBackupError(error);
  }
}
