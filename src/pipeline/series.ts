import { resolveWindow } from "../render/chartModel";
import type { LineChart, LineSeries } from "../render/types";
import { Aggregator } from "../stats/aggregator";
import { groupKeyId, type SeriesKey } from "../stats/types";

export interface WindowOptions {
  start?: number;
  end?: number;
}

export interface LineLayout {
  /** Series whose length sets the default window end. */
  reference: string;
  emphasis?: (name: string) => boolean;
}

function referenceLength(
  series: ReadonlyMap<string, readonly number[]>,
  reference: string,
): number {
  const ref = series.get(reference);
  if (ref) return ref.length;
  let longest = 0;
  for (const values of series.values()) {
    longest = Math.max(longest, values.length);
  }
  return longest;
}

/**
 * Slice every series to one shared window and summarize what remains.
 */
export function buildLineChart(
  meta: Pick<LineChart, "title" | "xLabel" | "yLabel" | "unit">,
  source: string,
  series: ReadonlyMap<string, readonly number[]>,
  layout: LineLayout,
  options: WindowOptions = {},
): LineChart {
  const window = resolveWindow(
    referenceLength(series, layout.reference),
    options.start,
    options.end,
  );

  const aggregator = new Aggregator<SeriesKey>();
  const sliced = new Map<string, number[]>();
  for (const [name, values] of series) {
    const samples = values.slice(window.start, window.end);
    sliced.set(name, samples);
    if (samples.length > 0) {
      aggregator.addAll({ kind: "series", source, name }, samples);
    }
  }

  const stats = new Map(aggregator.finalize().map((e) => [e.id, e.stats]));
  const lines: LineSeries[] = [...sliced].map(([name, samples]) => ({
    label: name,
    samples,
    emphasis: layout.emphasis?.(name) ?? false,
    stats: stats.get(groupKeyId({ kind: "series", source, name })) ?? null,
  }));

  return { type: "line", ...meta, window, series: lines };
}
