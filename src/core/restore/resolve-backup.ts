/**
 * Locate a named archive inside the backup directory
 */

import * as path from "node:path";
import { InvalidArgumentError, NotFoundError, toBackupError } from "../../utils/errors";
import { ARCHIVE_EXTENSION, hasArchiveExtension } from "../../utils/naming";
import { canonicalize, pathExists } from "../../utils/path";

/**
 * Map a backup name (bare, without ".zip", or an absolute path) to an
 * existing archive that lives directly in `backupDir`.
 */
export async function resolveBackupFile(name: string, backupDir: string): Promise<string> {
  try {
    const dir = path.resolve(backupDir);
    let candidate: string;

    if (path.isAbsolute(name)) {
      candidate = path.normalize(name);
      if (path.dirname(candidate) !== dir) {
        throw new InvalidArgumentError(
          `Backup ${name} must reside within configured directory ${dir}`,
        );
      }
    } else {
      candidate = path.join(dir, name);
    }

    if (!(await pathExists(candidate)) && !hasArchiveExtension(candidate)) {
      const withExtension = `${candidate}${ARCHIVE_EXTENSION}`;
      if (await pathExists(withExtension)) {
        candidate = withExtension;
      }
    }

    if (!(await pathExists(candidate))) {
      throw new NotFoundError(`Backup ${name} not found in ${dir}`);
    }

    const [realFile, realDir] = await Promise.all([canonicalize(candidate), canonicalize(dir)]);
    if (path.dirname(realFile) !== realDir) {
      throw new InvalidArgumentError(
        `Backup ${name} must reside within configured directory ${dir}`,
      );
    }

    return candidate;
  } catch (error) {
    throw toBackupError(error);
  }
}
