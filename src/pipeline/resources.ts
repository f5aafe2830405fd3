import { readArtifact } from "../fs/util";
import { parseResourceUsage } from "../parsers/resourceUsage";
import type { PipelineResult } from "../render/types";
import { buildLineChart, type WindowOptions } from "./series";
import { REFERENCE_RESOURCE } from "./tags";

export interface ResourceOptions extends WindowOptions {
  /**
   * Keep only fields whose name occurs in this string, e.g. `"utime,stime"`.
   */
  values?: string;
}

export function selectSeries(
  series: ReadonlyMap<string, number[]>,
  filter?: string,
): Map<string, number[]> {
  if (!filter) return new Map(series);
  return new Map([...series].filter(([name]) => filter.includes(name)));
}

/**
 * rusage fields of the VMM process over benchmark iterations.
 */
export async function runResourceUsage(
  file: string,
  options: ResourceOptions = {},
): Promise<PipelineResult> {
  const all = parseResourceUsage(await readArtifact(file), file);

  const chart = buildLineChart(
    { title: "Resource usage", xLabel: "iteration", yLabel: "resource", unit: "count" },
    file,
    selectSeries(all, options.values),
    { reference: REFERENCE_RESOURCE },
    options,
  );
  return { chart, failures: [] };
}
