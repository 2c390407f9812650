/**
 * Copy an external archive into the backup directory
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  AlreadyExistsError,
  InvalidArgumentError,
  NotFoundError,
  toBackupError,
} from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { hasParentSegment, pathExists, resolveAgainst } from "../../utils/path";
import { copyWithMetadata } from "./copy";

const log = createLogger("transfer");

export interface UploadOptions {
  backupDir: string;
  /** Relative sources resolve against this root */
  baseRoot: string;
  /** Stored name; defaults to the source's own file name */
  name?: string;
  overwrite?: boolean;
}

/**
 * File name an upload is stored under. Absolute names and names with a ".."
 * component are rejected; any directory part of an accepted name is dropped.
 */
export function resolveUploadName(sourcePath: string, name?: string): string {
  if (name === undefined || name === "") {
    return path.basename(sourcePath);
  }

  if (path.isAbsolute(name) || name.startsWith("/") || hasParentSegment(name)) {
    throw new InvalidArgumentError(`Invalid backup name: ${name}`);
  }

  const fileName = path.basename(name.replace(/\\/g, "/"));
  if (fileName === "" || fileName === ".") {
    throw new InvalidArgumentError(`Invalid backup name: ${name}`);
  }

  return fileName;
}

export async function uploadBackup(source: string, options: UploadOptions): Promise<string> {
  try {
    const sourcePath = resolveAgainst(source, options.baseRoot);
    if (!(await pathExists(sourcePath))) {
      throw new NotFoundError(`Upload source not found: ${sourcePath}`);
    }

    const fileName = resolveUploadName(sourcePath, options.name);

    await fs.mkdir(options.backupDir, { recursive: true });
    const destination = path.resolve(options.backupDir, fileName);

    if (!options.overwrite && (await pathExists(destination))) {
      throw new AlreadyExistsError(`Backup already exists: ${destination}`);
    }

    await copyWithMetadata(sourcePath, destination);
    log.info(`Uploaded ${sourcePath} as ${fileName}`);

    return destination;
  } catch (error) {
    throw toBackupError(error);
  }
}
