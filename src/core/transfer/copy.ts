import * as fs from "node:fs/promises";

/**
 * Copy a file and carry over its permission bits and timestamps.
 */
export async function copyWithMetadata(source: string, destination: string): Promise<void> {
  await fs.copyFile(source, destination);
  const stats = await fs.stat(source);
  await fs.chmod(destination, stats.mode & 0o7777);
  await fs.utimes(destination, stats.atime, stats.mtime);
}
