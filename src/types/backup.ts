/**
 * Backup operation type definitions
 */

export interface CollectedFile {
  absolutePath: string;
  /** Member name: POSIX path relative to the base root */
  relativePath: string;
  size: number;
}

export interface CollectFilesResult {
  files: CollectedFile[];
  /** Resolved sources that existed */
  sourcePaths: string[];
  /** Resolved sources that were skipped because they do not exist */
  missingPaths: string[];
}

export interface RetentionResult {
  kept: string[];
  deleted: string[];
  failed: string[];
}

export interface ArchiveResult {
  archivePath: string;
  archiveName: string;
  sizeBytes: number;
  filesCount: number;
  sourcePaths: string[];
  /** Present when a retention cap was applied after the write */
  retention?: RetentionResult;
}

export interface BackupListing {
  name: string;
  path: string;
  sizeBytes: number;
  modifiedAt: Date;
  /** Name matches the system pattern, so retention may prune it */
  managed: boolean;
}

export interface ArchiveInspection {
  name: string;
  path: string;
  sizeBytes: number;
  checksum: string;
  members: string[];
}
