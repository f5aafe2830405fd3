import { discoverResultSets, resultSetFilePath } from "../discovery";
import { logger } from "../logging";
import { parseStartupTimes } from "../parsers/startupTime";
import { buildBarChart } from "../render/chartModel";
import type { PipelineResult } from "../render/types";
import { Aggregator } from "../stats/aggregator";
import { DEFAULT_PERCENTILES } from "../stats/statistics";
import type { StartupKey } from "../stats/types";
import { createFileContext, readAndParse, type PipelineOptions } from "./files";
import { Tags } from "./tags";

export interface StartupOptions extends PipelineOptions {
  percentiles?: readonly number[];
}

/**
 * Startup times pooled per boot-time result set: every `startup_time` file
 * of a directory feeds one group, summarized with percentiles.
 */
export async function runStartupTime(
  root: string,
  options: StartupOptions = {},
): Promise<PipelineResult> {
  const ctx = createFileContext(!options.strict);
  const aggregator = new Aggregator<StartupKey>();

  const sets = await discoverResultSets(root, Tags.BOOTTIME, {
    fileTag: Tags.STARTUP_TIME,
  });
  for (const set of sets) {
    const key: StartupKey = { kind: "startup", run: set.name };
    if (options.strict && set.files.length > 0) {
      aggregator.register(key);
    }

    for (const file of set.files) {
      const samples = await readAndParse(
        resultSetFilePath(set, file),
        parseStartupTimes,
        ctx,
      );
      if (samples === null) continue;
      if (samples.length === 0) {
        logger.warn(`${file} in ${set.name} holds no startup times`);
        continue;
      }
      aggregator.addAll(key, samples);
    }
  }

  const chart = buildBarChart(
    { title: "Startup time", yLabel: "mean/std: us", unit: "us" },
    aggregator.finalize({
      percentiles: options.percentiles ?? DEFAULT_PERCENTILES,
    }),
    { series: (key) => key.run, category: () => "startup" },
  );
  return { chart, failures: ctx.failures };
}
