import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterAll, afterEach, beforeAll, describe, expect, test, vi } from "vitest";
import { enforceRetention, getPruneCandidates } from "../../src/core/cleanup/retention";
import { makeTempDir, removeDir, writeFiles } from "../helpers/fs";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, unlink: vi.fn(actual.unlink) };
});

describe("retention", () => {
  describe("getPruneCandidates", () => {
    const names = [
      "ha_backup_20240103_000000.zip",
      "notes.txt",
      "ha_backup_20240101_000000.zip",
      "manual.zip",
      "ha_backup_20240102_000000.zip",
    ];

    test("selects the oldest managed archives beyond the cap", () => {
      expect(getPruneCandidates(names, 1)).toEqual({
        kept: ["ha_backup_20240103_000000.zip"],
        pruned: ["ha_backup_20240101_000000.zip", "ha_backup_20240102_000000.zip"],
      });
    });

    test("prunes nothing when under the cap", () => {
      expect(getPruneCandidates(names, 5).pruned).toEqual([]);
    });

    test("prunes nothing when the cap is 0", () => {
      expect(getPruneCandidates(names, 0)).toEqual({
        kept: [
          "ha_backup_20240101_000000.zip",
          "ha_backup_20240102_000000.zip",
          "ha_backup_20240103_000000.zip",
        ],
        pruned: [],
      });
    });

    test("never selects archives outside the naming pattern", () => {
      const { kept, pruned } = getPruneCandidates(["manual.zip", "evil.zip"], 1);
      expect(kept).toEqual([]);
      expect(pruned).toEqual([]);
    });
  });

  describe("enforceRetention", () => {
    let tempDir: string;

    beforeAll(async () => {
      tempDir = await makeTempDir("retention");
    });

    afterAll(async () => {
      await removeDir(tempDir);
    });

    afterEach(() => {
      vi.mocked(fs.unlink).mockClear();
      vi.restoreAllMocks();
    });

    test("deletes the oldest system archives and leaves uploads alone", async () => {
      const dir = path.join(tempDir, "basic");
      await writeFiles(dir, {
        "ha_backup_20240101_000000.zip": "1",
        "ha_backup_20240102_000000.zip": "2",
        "ha_backup_20240103_000000.zip": "3",
        "ha_backup_20240104_000000.zip": "4",
        "before-upgrade.zip": "u",
      });

      const result = await enforceRetention(dir, 2);

      expect(result.deleted).toEqual([
        "ha_backup_20240101_000000.zip",
        "ha_backup_20240102_000000.zip",
      ]);
      expect(result.failed).toEqual([]);
      expect((await fs.readdir(dir)).sort()).toEqual([
        "before-upgrade.zip",
        "ha_backup_20240103_000000.zip",
        "ha_backup_20240104_000000.zip",
      ]);
    });

    test("treats a missing backup directory as empty", async () => {
      const result = await enforceRetention(path.join(tempDir, "missing"), 3);
      expect(result).toEqual({ kept: [], deleted: [], failed: [] });
    });

    test("ignores directories that match the pattern", async () => {
      const dir = path.join(tempDir, "dirs");
      await fs.mkdir(path.join(dir, "ha_backup_20230101_000000.zip"), { recursive: true });
      await writeFiles(dir, { "ha_backup_20240101_000000.zip": "1" });

      const result = await enforceRetention(dir, 1);

      expect(result.deleted).toEqual([]);
      expect(result.kept).toEqual(["ha_backup_20240101_000000.zip"]);
    });

    test("logs a failed deletion and carries on with the rest", async () => {
      const dir = path.join(tempDir, "failing");
      await writeFiles(dir, {
        "ha_backup_20240101_000000.zip": "1",
        "ha_backup_20240102_000000.zip": "2",
        "ha_backup_20240103_000000.zip": "3",
      });

      vi.mocked(fs.unlink).mockRejectedValueOnce(
        Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" }),
      );
      const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

      const result = await enforceRetention(dir, 1);

      expect(result.failed).toEqual(["ha_backup_20240101_000000.zip"]);
      expect(result.deleted).toEqual(["ha_backup_20240102_000000.zip"]);
      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(String(warnSpy.mock.calls[0]?.[0])).toContain(
        "Failed to remove old backup",
      );
      expect((await fs.readdir(dir)).sort()).toEqual([
        "ha_backup_20240101_000000.zip",
        "ha_backup_20240103_000000.zip",
      ]);
    });
  });
});
