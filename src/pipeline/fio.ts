import { discoverResultSets, resultSetFilePath } from "../discovery";
import { parseFioReport } from "../parsers/fio";
import { buildBarChart } from "../render/chartModel";
import type { PipelineResult } from "../render/types";
import { Aggregator } from "../stats/aggregator";
import type { FioKey } from "../stats/types";
import { createFileContext, readAndParse } from "./files";
import { FIO_MODE_ORDER, Tags } from "./tags";

export function fioSeriesLabel(key: FioKey): string {
  return `${key.run} ${key.device} ${key.blockSize}`;
}

/**
 * Mean/std bandwidth per (result set, device, mode, block size). A bad or
 * unrecognized report never aborts the batch: it is logged and skipped.
 */
export async function runFio(root: string): Promise<PipelineResult> {
  const ctx = createFileContext(true);
  const aggregator = new Aggregator<FioKey>();

  const sets = await discoverResultSets(root, Tags.FIO, { fileTag: Tags.FIO });
  for (const set of sets) {
    for (const file of set.files) {
      const sample = await readAndParse(
        resultSetFilePath(set, file),
        parseFioReport,
        ctx,
      );
      if (sample === null) continue;

      aggregator.add(
        {
          kind: "fio",
          run: set.name,
          device: sample.device,
          mode: sample.mode,
          blockSize: sample.blockSize,
        },
        sample.bandwidth,
      );
    }
  }

  const chart = buildBarChart(
    { title: "fio bandwidth", yLabel: "mean/std: MiB/s", unit: "MiB/s" },
    aggregator.finalize(),
    {
      series: fioSeriesLabel,
      category: (key) => key.mode,
      preferredCategories: FIO_MODE_ORDER,
    },
  );
  return { chart, failures: ctx.failures };
}
