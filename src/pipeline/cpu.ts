import { readArtifact } from "../fs/util";
import { cpuUsageByCore, parseCpuStat } from "../parsers/cpuStat";
import type { PipelineResult } from "../render/types";
import { buildLineChart, type WindowOptions } from "./series";
import { AGGREGATE_CPU } from "./tags";

/**
 * Per-core CPU utilization over time from a `cpu_usage.txt` log. One point
 * per sampling interval, so every series is one shorter than its snapshots.
 */
export async function runCpuUsage(
  file: string,
  options: WindowOptions = {},
): Promise<PipelineResult> {
  const usage = cpuUsageByCore(parseCpuStat(await readArtifact(file), file));

  const chart = buildLineChart(
    { title: "CPU utilization", xLabel: "seconds", yLabel: "cpu util %", unit: "%" },
    file,
    usage,
    { reference: AGGREGATE_CPU, emphasis: (core) => core === AGGREGATE_CPU },
    options,
  );
  return { chart, failures: [] };
}
