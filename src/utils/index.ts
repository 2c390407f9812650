/**
 * Utility exports
 */

// Crypto utilities
export { computeFileChecksum } from "./crypto";
// Errors
export {
  AlreadyExistsError,
  BackupError,
  type BackupErrorKind,
  FilesystemError,
  getErrorCode,
  InvalidArgumentError,
  isBackupError,
  NotFoundError,
  toBackupError,
} from "./errors";
// Formatting utilities
export { formatBytes, formatDuration } from "./format";
export type { LogLevel, ScopedLogger } from "./logger";
// Logger
export {
  createLogger,
  debug,
  error,
  getLogLevel,
  info,
  isLogLevel,
  logger,
  setLogLevel,
  warn,
} from "./logger";
export type { ParsedArchiveName } from "./naming";
// Naming utilities
export {
  ARCHIVE_NAME_PATTERN,
  formatArchiveTimestamp,
  generateArchiveName,
  isManagedArchiveName,
  MANAGED_ARCHIVE_PATTERN,
  parseArchiveName,
} from "./naming";
// Path utilities
export {
  canonicalize,
  ensureTrailingSep,
  hasParentSegment,
  hasTrailingSep,
  isDirectory,
  isPathWithinDir,
  pathExists,
  resolveAgainst,
  toArchiveMember,
} from "./path";
