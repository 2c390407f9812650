/**
 * Core module exports
 */

// Backup
export {
  type CreateBackupOptions,
  collectFiles,
  compareMemberNames,
  createBackup,
  writeZip,
} from "./backup";
// Catalog
export { inspectBackup, listBackups } from "./catalog";
// Cleanup
export { enforceRetention, getPruneCandidates, type PruneSelection } from "./cleanup";
// Restore
export {
  matchesTargets,
  normalizeTargets,
  type RestoreOptions,
  resolveBackupFile,
  restoreBackup,
} from "./restore";
// Service
export { BackupService, type BackupServiceOptions } from "./service";
// Transfer
export {
  copyWithMetadata,
  type DownloadOptions,
  downloadBackup,
  resolveDownloadTarget,
  resolveUploadName,
  type UploadOptions,
  uploadBackup,
} from "./transfer";
// Errors
export {
  AlreadyExistsError,
  BackupError,
  type BackupErrorKind,
  FilesystemError,
  InvalidArgumentError,
  isBackupError,
  NotFoundError,
} from "../utils/errors";
export type {
  ArchiveInspection,
  ArchiveResult,
  BackupListing,
  CollectedFile,
  ConfkeeperConfig,
  RetentionResult,
} from "../types";
