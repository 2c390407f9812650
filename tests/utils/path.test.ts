import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import {
  canonicalize,
  ensureTrailingSep,
  hasParentSegment,
  hasTrailingSep,
  isDirectory,
  isPathWithinDir,
  pathExists,
  resolveAgainst,
  toArchiveMember,
} from "../../src/utils/path";
import { makeTempDir, removeDir } from "../helpers/fs";

describe("path utilities", () => {
  describe("resolveAgainst", () => {
    test("resolves relative input against the root", () => {
      expect(resolveAgainst("automations.yaml", "/config")).toBe("/config/automations.yaml");
      expect(resolveAgainst("./blueprints/a.yaml", "/config")).toBe("/config/blueprints/a.yaml");
    });

    test("keeps absolute input, normalized", () => {
      expect(resolveAgainst("/mnt/usb//backups/./x.zip", "/config")).toBe("/mnt/usb/backups/x.zip");
    });

    test("does not require the path to exist", () => {
      expect(resolveAgainst("no/such/file", "/nowhere")).toBe("/nowhere/no/such/file");
    });
  });

  describe("toArchiveMember", () => {
    test("strips leading ./ and converts backslashes", () => {
      expect(toArchiveMember("./scripts.yaml")).toBe("scripts.yaml");
      expect(toArchiveMember("././a/b")).toBe("a/b");
      expect(toArchiveMember("blueprints\\automation\\x.yaml")).toBe("blueprints/automation/x.yaml");
    });

    test("leaves traversal segments for the containment check", () => {
      expect(toArchiveMember("../etc/passwd")).toBe("../etc/passwd");
    });
  });

  describe("isPathWithinDir", () => {
    test("accepts the directory and paths below it", () => {
      expect(isPathWithinDir("/config", "/config")).toBe(true);
      expect(isPathWithinDir("/config/a/b.yaml", "/config")).toBe(true);
    });

    test("rejects siblings sharing a prefix", () => {
      expect(isPathWithinDir("/config-evil/a", "/config")).toBe(false);
    });

    test("rejects traversal", () => {
      expect(isPathWithinDir("/config/../etc/passwd", "/config")).toBe(false);
    });
  });

  describe("separator helpers", () => {
    test("ensureTrailingSep", () => {
      expect(ensureTrailingSep("/a")).toBe("/a/");
      expect(ensureTrailingSep("/a/")).toBe("/a/");
    });

    test("hasTrailingSep", () => {
      expect(hasTrailingSep("out/")).toBe(true);
      expect(hasTrailingSep("out")).toBe(false);
    });

    test("hasParentSegment", () => {
      expect(hasParentSegment("../evil.zip")).toBe(true);
      expect(hasParentSegment("sub/../evil.zip")).toBe(true);
      expect(hasParentSegment("sub\\..\\evil.zip")).toBe(true);
      expect(hasParentSegment("sub/evil.zip")).toBe(false);
      expect(hasParentSegment("..evil.zip")).toBe(false);
    });
  });

  describe("filesystem helpers", () => {
    let tempDir: string;

    beforeAll(async () => {
      tempDir = await makeTempDir("path");
      await fs.mkdir(path.join(tempDir, "real"));
      await fs.writeFile(path.join(tempDir, "real", "file.txt"), "x");
      await fs.symlink(path.join(tempDir, "real"), path.join(tempDir, "link"));
      await fs.symlink(path.join(tempDir, "elsewhere", "target"), path.join(tempDir, "dangling"));
    });

    afterAll(async () => {
      await removeDir(tempDir);
    });

    test("canonicalize resolves symlinked directories", async () => {
      expect(await canonicalize(path.join(tempDir, "link", "file.txt"))).toBe(
        path.join(tempDir, "real", "file.txt"),
      );
    });

    test("canonicalize appends missing segments to the deepest existing ancestor", async () => {
      expect(await canonicalize(path.join(tempDir, "link", "new", "deep.txt"))).toBe(
        path.join(tempDir, "real", "new", "deep.txt"),
      );
    });

    test("canonicalize follows dangling links", async () => {
      expect(await canonicalize(path.join(tempDir, "dangling"))).toBe(
        path.join(tempDir, "elsewhere", "target"),
      );
    });

    test("canonicalize normalizes .. segments", async () => {
      expect(await canonicalize(path.join(tempDir, "real", "..", "real", "file.txt"))).toBe(
        path.join(tempDir, "real", "file.txt"),
      );
    });

    test("pathExists follows symlinks", async () => {
      expect(await pathExists(path.join(tempDir, "link", "file.txt"))).toBe(true);
      expect(await pathExists(path.join(tempDir, "dangling"))).toBe(false);
      expect(await pathExists(path.join(tempDir, "real", "file.txt", "below"))).toBe(false);
    });

    test("isDirectory", async () => {
      expect(await isDirectory(path.join(tempDir, "real"))).toBe(true);
      expect(await isDirectory(path.join(tempDir, "real", "file.txt"))).toBe(false);
      expect(await isDirectory(path.join(tempDir, "missing"))).toBe(false);
    });
  });
});
