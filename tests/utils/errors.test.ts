import { describe, expect, test } from "vitest";
import {
  AlreadyExistsError,
  BackupError,
  FilesystemError,
  getErrorCode,
  InvalidArgumentError,
  isBackupError,
  NotFoundError,
  toBackupError,
} from "../../src/utils/errors";

describe("errors", () => {
  test("each class carries its kind and name", () => {
    expect(new NotFoundError("x").kind).toBe("not_found");
    expect(new AlreadyExistsError("x").kind).toBe("already_exists");
    expect(new InvalidArgumentError("x").kind).toBe("invalid_argument");
    expect(new FilesystemError("x").kind).toBe("filesystem");
    expect(new InvalidArgumentError("x").name).toBe("InvalidArgumentError");
  });

  test("all extend BackupError", () => {
    expect(new NotFoundError("x")).toBeInstanceOf(BackupError);
    expect(isBackupError(new AlreadyExistsError("x"))).toBe(true);
    expect(isBackupError(new Error("x"))).toBe(false);
  });

  test("getErrorCode reads errno codes", () => {
    const err = Object.assign(new Error("denied"), { code: "EACCES" });
    expect(getErrorCode(err)).toBe("EACCES");
    expect(getErrorCode(new Error("plain"))).toBeUndefined();
    expect(getErrorCode("ENOENT")).toBeUndefined();
  });

  describe("toBackupError", () => {
    test("passes engine errors through", () => {
      const original = new NotFoundError("missing");
      expect(toBackupError(original)).toBe(original);
    });

    test("wraps other errors as filesystem failures", () => {
      const original = Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
      const wrapped = toBackupError(original);

      expect(wrapped).toBeInstanceOf(FilesystemError);
      expect(wrapped.message).toBe("EACCES: permission denied");
      expect(wrapped.cause).toBe(original);
    });

    test("wraps non-Error values", () => {
      const wrapped = toBackupError("boom");
      expect(wrapped).toBeInstanceOf(FilesystemError);
      expect(wrapped.message).toBe("boom");
    });
  });
});
