/**
 * Backup module exports
 */

export { type CreateBackupOptions, createBackup, writeZip } from "./archive-creator";
export { collectFiles, compareMemberNames } from "./file-collector";
