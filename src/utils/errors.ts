/**
 * Engine error types
 *
 * Every engine operation fails with one of the four subclasses below. Callers
 * can switch on `kind` instead of chaining `instanceof` checks.
 */

export type BackupErrorKind = "not_found" | "already_exists" | "invalid_argument" | "filesystem";

export abstract class BackupError extends Error {
  abstract readonly kind: BackupErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends BackupError {
  readonly kind = "not_found" as const;
}

export class AlreadyExistsError extends BackupError {
  readonly kind = "already_exists" as const;
}

export class InvalidArgumentError extends BackupError {
  readonly kind = "invalid_argument" as const;
}

export class FilesystemError extends BackupError {
  readonly kind = "filesystem" as const;
}

export function isBackupError(error: unknown): error is BackupError {
  return error instanceof BackupError;
}

/**
 * Node's system errors carry an errno string such as "ENOENT" on `code`.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Classify an arbitrary thrown value. Engine errors pass through untouched,
 * anything else is reported as a filesystem failure with the original attached.
 */
export function toBackupError(error: unknown): BackupError {
  if (isBackupError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new FilesystemError(message, { cause: error });
}
