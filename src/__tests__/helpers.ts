import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { vi } from "vitest";
import { logger, setLogger, type Logger } from "../logging";

export async function makeTempDir(prefix = "perfstat-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** Write `files` (relative path -> content) under `root`, creating directories. */
export async function writeFiles(
  root: string,
  files: Record<string, string>,
): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const filePath = path.join(root, rel);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, "utf-8");
  }
}

export function createSpyLogger() {
  return {
    debug: vi.fn<(message: string, ...args: unknown[]) => void>(),
    info: vi.fn<(message: string, ...args: unknown[]) => void>(),
    warn: vi.fn<(message: string, ...args: unknown[]) => void>(),
    error: vi.fn<(message: string, ...args: unknown[]) => void>(),
    json: vi.fn<(data: unknown) => void>(),
  } satisfies Logger;
}

/**
 * Swap the module logger for a spy; returns the spy and a restore function.
 */
export function installSpyLogger() {
  const original = logger;
  const spy = createSpyLogger();
  setLogger(spy);
  return { spy, restore: () => setLogger(original) };
}

export function fioReport(
  rw: string,
  bs: string,
  filename: string,
  bw: { read?: number; write?: number },
): string {
  return JSON.stringify({
    "fio version": "fio-3.36",
    jobs: [
      {
        jobname: "a",
        "job options": { name: "a", filename, rw, bs, ioengine: "libaio" },
        read: { bw: bw.read ?? 0, iops: 0 },
        write: { bw: bw.write ?? 0, iops: 0 },
      },
    ],
  });
}

export function iperfReport(reverse: number, bitsPerSecond: number[]): string {
  return JSON.stringify({
    start: { test_start: { protocol: "TCP", reverse, duration: 10 } },
    intervals: bitsPerSecond.map((bps, i) => ({
      streams: [],
      sum: { start: i, end: i + 1, bits_per_second: bps },
    })),
    end: {},
  });
}
