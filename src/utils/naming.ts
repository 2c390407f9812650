/**
 * Archive naming utilities
 */

export const ARCHIVE_PREFIX = "ha_backup_";
export const ARCHIVE_EXTENSION = ".zip";

// Pattern: ha_backup_YYYYMMDD_HHMMSS.zip
export const ARCHIVE_NAME_PATTERN = /^ha_backup_(\d{8})_(\d{6})\.zip$/;

// Anything retention is allowed to prune: ha_backup_*.zip
export const MANAGED_ARCHIVE_PATTERN = /^ha_backup_.*\.zip$/;

export interface ParsedArchiveName {
  date: string;
  time: string;
  createdAt: Date;
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Local-time timestamp as YYYYMMDD_HHMMSS.
 */
export function formatArchiveTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function generateArchiveName(now: Date = new Date()): string {
  return `${ARCHIVE_PREFIX}${formatArchiveTimestamp(now)}${ARCHIVE_EXTENSION}`;
}

export function parseArchiveName(archiveName: string): ParsedArchiveName | null {
  const match = archiveName.match(ARCHIVE_NAME_PATTERN);
  const date = match?.[1];
  const time = match?.[2];
  if (!date || !time) return null;

  const createdAt = new Date(
    Number(date.slice(0, 4)),
    Number(date.slice(4, 6)) - 1,
    Number(date.slice(6, 8)),
    Number(time.slice(0, 2)),
    Number(time.slice(2, 4)),
    Number(time.slice(4, 6)),
  );

  return { date, time, createdAt };
}

/**
 * Whether retention manages this archive. Uploaded archives with other names
 * are never pruned.
 */
export function isManagedArchiveName(archiveName: string): boolean {
  return MANAGED_ARCHIVE_PATTERN.test(archiveName);
}

/**
 * Case-sensitive: "backup.ZIP" is not an archive name.
 */
export function hasArchiveExtension(name: string): boolean {
  return name.endsWith(ARCHIVE_EXTENSION);
}
