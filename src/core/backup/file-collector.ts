/**
 * File collection for backup archives
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { CollectedFile, CollectFilesResult } from "../../types";
import { InvalidArgumentError } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { isPathWithinDir, pathExists, resolveAgainst } from "../../utils/path";

const log = createLogger("archiver");

function toMemberName(absolutePath: string, baseRoot: string): string {
  return path.relative(baseRoot, absolutePath).split(path.sep).join("/");
}

/**
 * Every regular file below `dir`. Symlinks, sockets and the like are skipped.
 */
async function walkDirectory(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walkDirectory(entryPath)));
    } else if (entry.isFile()) {
      files.push(entryPath);
    }
  }

  return files;
}

async function collectFilesFromSource(
  sourcePath: string,
  baseRoot: string,
): Promise<CollectedFile[]> {
  const stats = await fs.stat(sourcePath);

  let absolutePaths: string[];
  if (stats.isDirectory()) {
    absolutePaths = await walkDirectory(sourcePath);
  } else if (stats.isFile()) {
    absolutePaths = [sourcePath];
  } else {
    log.debug(`Skipping non-regular source: ${sourcePath}`);
    return [];
  }

  const files: CollectedFile[] = [];
  for (const absolutePath of absolutePaths) {
    const { size } = await fs.stat(absolutePath);
    files.push({ absolutePath, relativePath: toMemberName(absolutePath, baseRoot), size });
  }

  return files.sort((a, b) => compareMemberNames(a.relativePath, b.relativePath));
}

/**
 * Order member names component by component, so "a/b.txt" precedes "a-b.txt"
 * and "a.txt".
 */
export function compareMemberNames(a: string, b: string): number {
  const left = a.split("/");
  const right = b.split("/");
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const x = left[i] ?? "";
    const y = right[i] ?? "";
    if (x !== y) {
      return x < y ? -1 : 1;
    }
  }

  return left.length - right.length;
}

/**
 * Resolve sources against the base root and list the files each contributes,
 * in source order. Missing sources are skipped, not failed.
 */
export async function collectFiles(
  sources: string[],
  baseRoot: string,
): Promise<CollectFilesResult> {
  const root = path.resolve(baseRoot);
  const files: CollectedFile[] = [];
  const sourcePaths: string[] = [];
  const missingPaths: string[] = [];

  for (const source of sources) {
    const sourcePath = resolveAgainst(source, root);

    if (!(await pathExists(sourcePath))) {
      log.debug(`Skipping missing backup source: ${sourcePath}`);
      missingPaths.push(sourcePath);
      continue;
    }

    if (!isPathWithinDir(sourcePath, root)) {
      throw new InvalidArgumentError(
        `Backup source ${sourcePath} must reside within ${root}`,
      );
    }

    sourcePaths.push(sourcePath);
    const collected = await collectFilesFromSource(sourcePath, root);
    log.debug(`Collected ${collected.length} files from ${sourcePath}`);
    files.push(...collected);
  }

  return { files, sourcePaths, missingPaths };
}
