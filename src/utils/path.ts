/**
 * Path resolution and containment utilities
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { getErrorCode } from "./errors";

/**
 * Resolve a user-supplied path against a reference root.
 * Absolute inputs are only normalized. Never touches the filesystem.
 */
export function resolveAgainst(input: string, root: string): string {
  if (path.isAbsolute(input)) {
    return path.normalize(input);
  }
  return path.resolve(root, input);
}

/**
 * Normalize a relative path to the form used for zip member names:
 * forward slashes, no leading "./".
 */
export function toArchiveMember(input: string): string {
  let member = input.replace(/\\/g, "/");
  while (member.startsWith("./")) {
    member = member.slice(2);
  }
  return member;
}

/**
 * Check if a file path is within an allowed directory.
 * Prevents path traversal attacks.
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return (
    normalizedPath.startsWith(ensureTrailingSep(normalizedDir)) ||
    normalizedPath === normalizedDir
  );
}

/**
 * Ensure a path ends with a separator
 */
export function ensureTrailingSep(dirPath: string): string {
  return dirPath.endsWith(path.sep) ? dirPath : dirPath + path.sep;
}

/**
 * Whether the raw string names a directory by its trailing separator.
 */
export function hasTrailingSep(input: string): boolean {
  return input.endsWith("/") || input.endsWith(path.sep);
}

/**
 * Whether any component of the path is "..".
 */
export function hasParentSegment(input: string): boolean {
  return input.split(/[\\/]+/).includes("..");
}

const MAX_LINK_HOPS = 40;

async function readLinkOrNull(target: string): Promise<string | null> {
  try {
    return await fs.readlink(target);
  } catch {
    return null;
  }
}

/**
 * Resolve symlinks and normalize. Paths that do not exist yet are resolved
 * through their deepest existing ancestor, with the missing tail appended.
 * Dangling links are followed to where they point.
 */
export async function canonicalize(target: string): Promise<string> {
  const absolute = path.resolve(target);
  const missing: string[] = [];
  let current = absolute;
  let hops = 0;

  for (;;) {
    try {
      const real = await fs.realpath(current);
      return missing.length > 0 ? path.join(real, ...[...missing].reverse()) : real;
    } catch (error) {
      const code = getErrorCode(error);
      if (code !== "ENOENT" && code !== "ENOTDIR") {
        throw error;
      }

      const link = await readLinkOrNull(current);
      if (link !== null) {
        if (++hops > MAX_LINK_HOPS) {
          throw error;
        }
        current = path.resolve(path.dirname(current), link);
        continue;
      }

      const parent = path.dirname(current);
      if (parent === current) {
        return absolute;
      }
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

/**
 * Existence as seen through symlinks: a dangling link does not exist.
 */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch (error) {
    const code = getErrorCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return false;
    }
    throw error;
  }
}

export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch (error) {
    if (getErrorCode(error) === "ENOENT") {
      return false;
    }
    throw error;
  }
}
