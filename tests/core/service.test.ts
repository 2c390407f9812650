import { createHash } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, test, vi } from "vitest";
import { BackupService } from "../../src/core/service";
import { normalizeMaxBackups } from "../../src/config/validator";
import { DEFAULT_SOURCES } from "../../src/config/defaults";
import { exists, listZipMembers, makeTempDir, removeDir, writeFiles } from "../helpers/fs";

describe("normalizeMaxBackups", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test.each([
    [undefined, 0],
    [null, 0],
    [3, 3],
    [2.7, 2],
    [-4, 0],
    ["5", 5],
    [" 7 ", 7],
    ["-2", 0],
  ])("%j becomes %d", (input, expected) => {
    expect(normalizeMaxBackups(input)).toBe(expected);
  });

  test("ignores values that are not integers, with a warning", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(normalizeMaxBackups("three")).toBe(0);
    expect(normalizeMaxBackups({ count: 3 })).toBe(0);
    expect(normalizeMaxBackups(Number.NaN)).toBe(0);

    expect(warnSpy).toHaveBeenCalledTimes(3);
    expect(String(warnSpy.mock.calls[0]?.[0])).toContain("Invalid maxBackups value three");
  });
});

describe("BackupService", () => {
  let tempDir: string;
  let root: string;
  let caseIndex = 0;

  beforeAll(async () => {
    tempDir = await makeTempDir("service");
  });

  afterAll(async () => {
    await removeDir(tempDir);
  });

  beforeEach(async () => {
    caseIndex++;
    root = path.join(tempDir, `case-${caseIndex}`);
    await writeFiles(root, {
      "configuration.yaml": "homeassistant: {}\n",
      "scripts.yaml": "{}\n",
      "blueprints/motion.yaml": "blueprint: motion\n",
    });
  });

  function createService(overrides: { maxBackups?: unknown; sources?: string[] } = {}) {
    return new BackupService({
      root,
      backupDirectory: "backups",
      sources: overrides.sources ?? DEFAULT_SOURCES,
      maxBackups: overrides.maxBackups,
    });
  }

  test("resolves the backup directory against the root", () => {
    const service = createService({ maxBackups: "4" });

    expect(service.backupDir).toBe(path.join(root, "backups"));
    expect(service.maxBackups).toBe(4);
  });

  test("backs up the default sources that exist", async () => {
    const result = await createService().backupNow();

    expect(result).not.toBeNull();
    expect(result?.sourcePaths).toEqual([
      path.join(root, "configuration.yaml"),
      path.join(root, "scripts.yaml"),
      path.join(root, "blueprints"),
    ]);
    expect(await listZipMembers(result?.archivePath ?? "")).toEqual([
      "configuration.yaml",
      "scripts.yaml",
      "blueprints/motion.yaml",
    ]);
  });

  test("uses explicit paths instead of the defaults", async () => {
    const result = await createService().backupNow(["blueprints"]);

    expect(await listZipMembers(result?.archivePath ?? "")).toEqual(["blueprints/motion.yaml"]);
  });

  test("falls back to the defaults when given an empty list", async () => {
    const result = await createService().backupNow([]);

    expect(result?.filesCount).toBe(3);
  });

  test("returns null without sources and creates nothing", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});

    const result = await createService({ sources: [] }).backupNow();

    expect(result).toBeNull();
    expect(await exists(path.join(root, "backups"))).toBe(false);
    vi.restoreAllMocks();
  });

  test("returns null when no source exists", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});

    const result = await createService().backupNow(["www", "custom_components"]);

    expect(result).toBeNull();
    expect(await exists(path.join(root, "backups"))).toBe(false);
    vi.restoreAllMocks();
  });

  test("lists stored archives and flags the system ones", async () => {
    await writeFiles(path.join(root, "backups"), {
      "ha_backup_20240102_000000.zip": "b",
      "ha_backup_20240101_000000.zip": "a",
      "before-upgrade.zip": "u",
      "notes.txt": "n",
    });

    const listings = await createService().listBackups();

    expect(listings.map((l) => [l.name, l.managed, l.sizeBytes])).toEqual([
      ["before-upgrade.zip", false, 1],
      ["ha_backup_20240101_000000.zip", true, 1],
      ["ha_backup_20240102_000000.zip", true, 1],
    ]);
  });

  test("lists nothing before the first backup", async () => {
    expect(await createService().listBackups()).toEqual([]);
  });

  test("inspects an archive's members and checksum", async () => {
    const service = createService();
    const result = await service.backupNow(["configuration.yaml", "blueprints"]);
    if (!result) throw new Error("expected an archive");

    const inspection = await service.inspectBackup(result.archiveName.replace(/\.zip$/, ""));
    const expectedChecksum = createHash("sha256")
      .update(await fs.readFile(result.archivePath))
      .digest("hex");

    expect(inspection).toEqual({
      name: result.archiveName,
      path: result.archivePath,
      sizeBytes: result.sizeBytes,
      checksum: expectedChecksum,
      members: ["configuration.yaml", "blueprints/motion.yaml"],
    });
  });

  test("round-trips through download, upload and restore", async () => {
    const service = createService();
    const result = await service.backupNow();
    if (!result) throw new Error("expected an archive");

    const exported = await service.downloadBackup(
      result.archiveName,
      path.join(tempDir, `export-${caseIndex}.zip`),
    );
    await fs.rm(result.archivePath);
    await service.uploadBackup(exported, result.archiveName);
    await fs.rm(path.join(root, "scripts.yaml"));

    const restored = await service.restoreBackup(result.archiveName, ["scripts.yaml"]);

    expect(restored).toEqual([path.join(root, "scripts.yaml")]);
    expect(await fs.readFile(path.join(root, "scripts.yaml"), "utf8")).toBe("{}\n");
  });
});
