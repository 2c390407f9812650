/**
 * Centralized type exports for confkeeper
 */

// Backup types
export type {
  ArchiveInspection,
  ArchiveResult,
  BackupListing,
  CollectedFile,
  CollectFilesResult,
  RetentionResult,
} from "./backup";
// Config types
export type { ArchiveConfig, ConfkeeperConfig } from "./config";
