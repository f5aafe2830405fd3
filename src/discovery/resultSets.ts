import type { Dirent, Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { DiscoveryError } from "../errors";
import { logger } from "../logging";

/**
 * One directory of artifacts from a single test campaign. The directory name
 * carries the benchmark tag, e.g. `fio_1718120000`.
 */
export interface ResultSet {
  readonly name: string;
  readonly dir: string;
  readonly files: readonly string[];
}

export interface DiscoveryOptions {
  /** Keep only member files whose name contains this substring. */
  fileTag?: string;
}

/**
 * Case-sensitive substring match shared by directory and file selection.
 * An undefined or empty tag matches everything.
 */
export function matchesTag(name: string, tag?: string): boolean {
  return tag === undefined || tag === "" || name.includes(tag);
}

async function listEntries(dir: string): Promise<Dirent[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => a.name.localeCompare(b.name));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DiscoveryError(dir, `Cannot list ${dir}: ${reason}`);
  }
}

/**
 * List the result sets under `root` whose directory name contains `dirTag`,
 * each with its member files (optionally filtered by `options.fileTag`).
 * Directories and files are returned sorted by name.
 */
export async function discoverResultSets(
  root: string,
  dirTag: string,
  options: DiscoveryOptions = {},
): Promise<ResultSet[]> {
  let stat: Stats;
  try {
    stat = await fs.stat(root);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DiscoveryError(root, `Results root not found: ${root} (${reason})`);
  }
  if (!stat.isDirectory()) {
    throw new DiscoveryError(root, `Results root is not a directory: ${root}`);
  }

  const entries = await listEntries(root);
  const sets: ResultSet[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory() || !matchesTag(entry.name, dirTag)) {
      logger.debug(`skipping ${entry.name}: not a '${dirTag}' result set`);
      continue;
    }

    const dir = path.join(root, entry.name);
    const files = (await listEntries(dir))
      .filter((f) => f.isFile() && matchesTag(f.name, options.fileTag))
      .map((f) => f.name);

    sets.push(Object.freeze({ name: entry.name, dir, files: Object.freeze(files) }));
  }

  return sets;
}

export function resultSetFilePath(set: ResultSet, file: string): string {
  return path.join(set.dir, file);
}
