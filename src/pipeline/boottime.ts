import { discoverResultSets, resultSetFilePath } from "../discovery";
import { logger } from "../logging";
import { parseBoottime } from "../parsers/boottime";
import { buildBarChart } from "../render/chartModel";
import type { PipelineResult } from "../render/types";
import { Aggregator } from "../stats/aggregator";
import type { BoottimeKey } from "../stats/types";
import { createFileContext, readAndParse, type PipelineOptions } from "./files";
import { Tags } from "./tags";

export interface BoottimeOptions extends PipelineOptions {
  /**
   * File-name substrings splitting a result set into sub-groups, e.g.
   * `["drive", "pmem"]`. Files matching none are skipped.
   */
  partitions?: readonly string[];
}

export function boottimeLabel(key: BoottimeKey): string {
  return key.partition !== undefined ? `${key.run}/${key.partition}` : key.run;
}

/**
 * Mean/std boot time per result set (or per result set and partition).
 */
export async function runBoottime(
  root: string,
  options: BoottimeOptions = {},
): Promise<PipelineResult> {
  const partitions = options.partitions ?? [];
  const ctx = createFileContext(!options.strict);
  const aggregator = new Aggregator<BoottimeKey>();

  for (const set of await discoverResultSets(root, Tags.BOOTTIME)) {
    for (const file of set.files) {
      if (file.includes(Tags.STARTUP_TIME)) {
        continue;
      }

      let key: BoottimeKey = { kind: "boottime", run: set.name };
      if (partitions.length > 0) {
        const partition = partitions.find((p) => file.includes(p));
        if (partition === undefined) {
          logger.debug(`skipping ${file}: matches no partition of ${set.name}`);
          continue;
        }
        key = { ...key, partition };
      }
      if (options.strict) {
        aggregator.register(key);
      }

      const value = await readAndParse(
        resultSetFilePath(set, file),
        parseBoottime,
        ctx,
      );
      if (value !== null) {
        aggregator.add(key, value);
      }
    }
  }

  const chart = buildBarChart(
    { title: "Boot time", yLabel: "mean time/std: ms", unit: "ms" },
    aggregator.finalize(),
    { series: boottimeLabel, category: () => "boottime" },
  );
  return { chart, failures: ctx.failures };
}
