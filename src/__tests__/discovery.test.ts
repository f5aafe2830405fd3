import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  discoverResultSets,
  matchesTag,
  resultSetFilePath,
} from "../discovery";
import { DiscoveryError } from "../errors";
import { installSpyLogger, makeTempDir, writeFiles } from "./helpers";

describe("matchesTag", () => {
  it("matches case-sensitive substrings", () => {
    expect(matchesTag("fio_1718120000", "fio")).toBe(true);
    expect(matchesTag("FIO_1718120000", "fio")).toBe(false);
  });

  it("matches everything without a tag", () => {
    expect(matchesTag("anything")).toBe(true);
    expect(matchesTag("anything", "")).toBe(true);
  });
});

describe("discoverResultSets", () => {
  let root: string;
  let restore: () => void;

  beforeEach(async () => {
    root = await makeTempDir();
    restore = installSpyLogger().restore;
  });

  afterEach(async () => {
    restore();
    await fs.rm(root, { recursive: true, force: true });
  });

  it("returns matching directories and their files sorted by name", async () => {
    await writeFiles(root, {
      "fio_2/fio_write.json": "{}",
      "fio_1/fio_read.json": "{}",
      "fio_1/fio_randread.json": "{}",
      "iperf_1/iperf_h2g.json": "{}",
      "fio_notes.txt": "not a directory",
    });

    const sets = await discoverResultSets(root, "fio");
    expect(sets.map((s) => s.name)).toEqual(["fio_1", "fio_2"]);
    expect(sets[0]?.files).toEqual(["fio_randread.json", "fio_read.json"]);
    expect(sets[0]?.dir).toBe(path.join(root, "fio_1"));
  });

  it("filters member files by tag and ignores subdirectories", async () => {
    await writeFiles(root, {
      "boottime_1/boottime_drive_0.txt": "total=1ms",
      "boottime_1/startup_time_0.txt": "x 1us",
      "boottime_1/nested/startup_time_1.txt": "x 2us",
    });

    const sets = await discoverResultSets(root, "boottime", {
      fileTag: "startup_time",
    });
    expect(sets).toHaveLength(1);
    expect(sets[0]?.files).toEqual(["startup_time_0.txt"]);
  });

  it("keeps a matching directory with no files", async () => {
    await fs.mkdir(path.join(root, "iperf_empty"));
    const sets = await discoverResultSets(root, "iperf");
    expect(sets).toEqual([
      { name: "iperf_empty", dir: path.join(root, "iperf_empty"), files: [] },
    ]);
  });

  it("returns frozen result sets", async () => {
    await writeFiles(root, { "fio_1/fio_a.json": "{}" });
    const [set] = await discoverResultSets(root, "fio");
    expect(Object.isFrozen(set)).toBe(true);
    expect(Object.isFrozen(set?.files)).toBe(true);
  });

  it("joins member paths onto the set directory", async () => {
    await writeFiles(root, { "fio_1/fio_a.json": "{}" });
    const [set] = await discoverResultSets(root, "fio");
    if (!set) throw new Error("expected a result set");
    expect(resultSetFilePath(set, "fio_a.json")).toBe(
      path.join(root, "fio_1", "fio_a.json"),
    );
  });

  it("fails when the root does not exist", async () => {
    await expect(
      discoverResultSets(path.join(root, "missing"), "fio"),
    ).rejects.toThrow(DiscoveryError);
  });

  it("fails when the root is a file", async () => {
    await writeFiles(root, { "file.txt": "x" });
    const file = path.join(root, "file.txt");
    await expect(discoverResultSets(file, "fio")).rejects.toThrow(
      `Results root is not a directory: ${file}`,
    );
  });
});
