/**
 * Restore archive members into the base configuration root
 */

import { createWriteStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import { Open } from "unzipper";
import {
  AlreadyExistsError,
  InvalidArgumentError,
  toBackupError,
} from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { canonicalize, isPathWithinDir, pathExists, toArchiveMember } from "../../utils/path";
import { resolveBackupFile } from "./resolve-backup";

const log = createLogger("restore");

export interface RestoreOptions {
  backupDir: string;
  baseRoot: string;
  /** Relative path prefixes; empty or absent restores every member */
  targets?: string[];
  overwrite?: boolean;
}

/**
 * Validate and normalize restore targets to archive member form.
 */
export function normalizeTargets(targets: string[] | undefined): string[] {
  if (!targets) return [];

  return targets.map((target) => {
    if (path.isAbsolute(target) || path.posix.isAbsolute(target.replace(/\\/g, "/"))) {
      throw new InvalidArgumentError(`Restore targets must be relative: ${target}`);
    }
    return toArchiveMember(target);
  });
}

export function matchesTargets(member: string, targets: string[]): boolean {
  if (targets.length === 0) return true;
  return targets.some((target) => member === target || member.startsWith(`${target}/`));
}

function isDirectoryMarker(entryPath: string): boolean {
  return entryPath.endsWith("/") || entryPath.endsWith("\\");
}

const S_IFMT = 0o170000;
const S_IFLNK = 0o120000;

/**
 * Unix-made zips keep the file mode in the high 16 bits of the external
 * attributes.
 */
function isSymlinkEntry(externalFileAttributes: number): boolean {
  return ((externalFileAttributes >>> 16) & S_IFMT) === S_IFLNK;
}

/**
 * Extract the selected members of a backup into `baseRoot`, in archive order.
 * Returns the absolute paths written. Stops at the first unsafe or
 * conflicting member; files already written stay in place.
 */
export async function restoreBackup(name: string, options: RestoreOptions): Promise<string[]> {
  try {
    const archivePath = await resolveBackupFile(name, options.backupDir);
    const targets = normalizeTargets(options.targets);
    const root = await canonicalize(options.baseRoot);
    const overwrite = options.overwrite ?? false;

    log.info(`Restoring ${archivePath} into ${root}`);

    const directory = await Open.file(archivePath);
    const restored: string[] = [];

    for (const entry of directory.files) {
      if (!entry.path || entry.type === "Directory" || isDirectoryMarker(entry.path)) {
        continue;
      }

      const member = toArchiveMember(entry.path);
      if (!matchesTargets(member, targets)) {
        continue;
      }

      if (isSymlinkEntry(entry.externalFileAttributes)) {
        throw new InvalidArgumentError(`Refusing to restore symbolic link: ${entry.path}`);
      }

      const destination = await canonicalize(path.resolve(root, member));
      if (destination === root || !isPathWithinDir(destination, root)) {
        throw new InvalidArgumentError(`Refusing to restore unsafe path: ${entry.path}`);
      }

      if (!overwrite && (await pathExists(destination))) {
        throw new AlreadyExistsError(`Restore target already exists: ${destination}`);
      }

      await fs.mkdir(path.dirname(destination), { recursive: true });
      await pipeline(entry.stream(), createWriteStream(destination));

      log.debug(`Restored ${member}`);
      restored.push(destination);
    }

    log.info(`Restored ${restored.length} file(s) from ${path.basename(archivePath)}`);
    return restored;
  } catch (error) {
    throw toBackupError(error);
  }
}
