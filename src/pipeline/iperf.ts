import { discoverResultSets, resultSetFilePath } from "../discovery";
import { logger } from "../logging";
import { parseIperfReport } from "../parsers/iperf";
import { buildBarChart } from "../render/chartModel";
import type { PipelineResult } from "../render/types";
import { Aggregator } from "../stats/aggregator";
import type { IperfKey } from "../stats/types";
import { createFileContext, readAndParse, type PipelineOptions } from "./files";
import { IPERF_DIRECTION_ORDER, Tags } from "./tags";

/**
 * Mean/std throughput per (result set, direction). Every measurement
 * interval of every report is one sample.
 */
export async function runIperf(
  root: string,
  options: PipelineOptions = {},
): Promise<PipelineResult> {
  const ctx = createFileContext(!options.strict);
  const aggregator = new Aggregator<IperfKey>();

  const sets = await discoverResultSets(root, Tags.IPERF, {
    fileTag: Tags.IPERF,
  });
  for (const set of sets) {
    for (const file of set.files) {
      const trial = await readAndParse(
        resultSetFilePath(set, file),
        parseIperfReport,
        ctx,
      );
      if (trial === null) continue;
      if (trial.samples.length === 0) {
        logger.warn(`${file} in ${set.name} has no measurement intervals`);
        continue;
      }
      aggregator.addAll(
        { kind: "iperf", run: set.name, direction: trial.direction },
        trial.samples,
      );
    }
  }

  const chart = buildBarChart(
    { title: "iperf throughput", yLabel: "mean/std: MiB/s", unit: "MiB/s" },
    aggregator.finalize(),
    {
      series: (key) => key.run,
      category: (key) => key.direction,
      preferredCategories: IPERF_DIRECTION_ORDER,
    },
  );
  return { chart, failures: ctx.failures };
}
