import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  loadConfig,
  mergeWithDefaults,
  applyOverrides,
  DEFAULT_CONFIG,
} from "../config";
import { CONFIG_FILE_NAME } from "../fs/paths";
import { SchemaValidationError, InvalidJsonError } from "../errors";
import { makeTempDir } from "./helpers";

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir("perfstat-config-test-");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(content: string): Promise<void> {
    await fs.writeFile(path.join(tempDir, CONFIG_FILE_NAME), content);
  }

  it("returns defaults when the config file does not exist", async () => {
    expect(await loadConfig(tempDir)).toEqual(DEFAULT_CONFIG);
  });

  it("fills missing fields from defaults", async () => {
    await writeConfig(JSON.stringify({ results_dir: "nightly", strict: true }));

    const result = await loadConfig(tempDir);

    expect(result.results_dir).toBe("nightly");
    expect(result.strict).toBe(true);
    expect(result.output_format).toBe("md");
    expect(result.percentiles).toEqual([50, 90, 99]);
    expect(result.boottime_partitions).toEqual([]);
  });

  it("applies overrides on top of the file", async () => {
    await writeConfig(JSON.stringify({ output_format: "csv" }));

    const result = await loadConfig(tempDir, { outputFormat: "json" });

    expect(result.output_format).toBe("json");
  });

  it("throws InvalidJsonError for malformed JSON", async () => {
    await writeConfig("{ results_dir: ");
    await expect(loadConfig(tempDir)).rejects.toThrow(InvalidJsonError);
  });

  it("throws SchemaValidationError for an unknown output format", async () => {
    await writeConfig(JSON.stringify({ output_format: "svg" }));
    await expect(loadConfig(tempDir)).rejects.toThrow(SchemaValidationError);
  });

  it("throws SchemaValidationError for out-of-range percentiles", async () => {
    await writeConfig(JSON.stringify({ percentiles: [50, 101] }));
    await expect(loadConfig(tempDir)).rejects.toThrow(SchemaValidationError);
  });
});

describe("mergeWithDefaults", () => {
  it("returns defaults for an empty config", () => {
    expect(mergeWithDefaults({})).toEqual(DEFAULT_CONFIG);
  });

  it("does not share arrays with the defaults", () => {
    const merged = mergeWithDefaults({});
    merged.percentiles.push(75);
    expect(DEFAULT_CONFIG.percentiles).toEqual([50, 90, 99]);
  });
});

describe("applyOverrides", () => {
  it("keeps config values when overrides are undefined", () => {
    expect(applyOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
  });

  it("replaces only the overridden fields", () => {
    const result = applyOverrides(DEFAULT_CONFIG, {
      resultsDir: "/data/results",
      strict: true,
      boottimePartitions: ["drive", "pmem"],
    });

    expect(result).toEqual({
      ...DEFAULT_CONFIG,
      results_dir: "/data/results",
      strict: true,
      boottime_partitions: ["drive", "pmem"],
    });
  });
});
