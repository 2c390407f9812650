/**
 * Archive creation for backups
 */

import { createWriteStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import archiver from "archiver";
import type { ArchiveResult, CollectedFile } from "../../types";
import { toBackupError } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { generateArchiveName } from "../../utils/naming";
import { enforceRetention } from "../cleanup/retention";
import { collectFiles } from "./file-collector";

const log = createLogger("archiver");

export interface CreateBackupOptions {
  /** Directory the archive is written to, created if missing */
  backupDir: string;
  /** Retention cap applied after a successful write; 0 disables pruning */
  maxBackups?: number;
  /** Deflate level, 0-9 */
  compression?: number;
  /** Clock used for the archive name */
  now?: Date;
}

/**
 * Archive `sources` (relative to `baseRoot`) into a new timestamped zip.
 * Returns null when none of the sources exist.
 */
export async function createBackup(
  sources: string[],
  baseRoot: string,
  options: CreateBackupOptions,
): Promise<ArchiveResult | null> {
  try {
    const { files, sourcePaths } = await collectFiles(sources, baseRoot);

    if (sourcePaths.length === 0) {
      log.warn("No valid sources found for backup");
      return null;
    }

    await fs.mkdir(options.backupDir, { recursive: true });

    const archiveName = generateArchiveName(options.now);
    const archivePath = path.resolve(options.backupDir, archiveName);

    await writeZip(archivePath, files, options.compression ?? 6);

    const { size } = await fs.stat(archivePath);
    log.info(`Created backup at ${archivePath} (${files.length} files, ${size} bytes)`);

    const result: ArchiveResult = {
      archivePath,
      archiveName,
      sizeBytes: size,
      filesCount: files.length,
      sourcePaths,
    };

    const cap = options.maxBackups ?? 0;
    if (cap > 0) {
      result.retention = await enforceRetention(options.backupDir, cap);
    }

    return result;
  } catch (error) {
    throw toBackupError(error);
  }
}

/**
 * Stream `files` into a deflated zip at `archivePath`. Symlinked files are
 * stored with the contents they point to. Any read failure rejects, and the
 * output is closed with whatever was flushed so far.
 */
export async function writeZip(
  archivePath: string,
  files: CollectedFile[],
  compression: number,
): Promise<void> {
  log.debug(`Writing zip archive with compression level ${compression}`);

  const entries: { contentPath: string; name: string }[] = [];
  for (const file of files) {
    entries.push({ contentPath: await fs.realpath(file.absolutePath), name: file.relativePath });
  }

  await new Promise<void>((resolve, reject) => {
    const output = createWriteStream(archivePath);
    const archive = archiver("zip", { zlib: { level: compression } });

    const fail = (error: Error) => {
      archive.abort();
      output.destroy();
      reject(error);
    };

    output.on("close", () => resolve());
    output.on("error", fail);
    archive.on("error", fail);
    // archiver reports a file it can no longer stat as a warning
    archive.on("warning", fail);

    archive.pipe(output);
    for (const entry of entries) {
      archive.file(entry.contentPath, { name: entry.name });
    }
    archive.finalize().catch(fail);
  });
}
