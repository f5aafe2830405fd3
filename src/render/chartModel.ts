import type { AggregateEntry, AggregateStat, GroupKey } from "../stats/types";
import type { BarChart, BarSeries, BarValue, ChartWindow } from "./types";

export function toBarValue(stats: AggregateStat): BarValue {
  const bar: BarValue = { mean: stats.mean, std: stats.std, count: stats.count };
  if (stats.percentiles) {
    bar.percentiles = stats.percentiles;
  }
  return bar;
}

export interface BarLayout<K extends GroupKey> {
  series(key: K): string;
  category(key: K): string;
  /** Categories listed first, in this order, when present in the data. */
  preferredCategories?: readonly string[];
}

/**
 * Lay aggregate entries out as grouped bars. Series keep first-seen order;
 * categories follow `preferredCategories`, then first-seen order.
 */
export function buildBarChart<K extends GroupKey>(
  meta: Pick<BarChart, "title" | "yLabel" | "unit">,
  entries: readonly AggregateEntry<K>[],
  layout: BarLayout<K>,
): BarChart {
  const seen = new Set(entries.map((e) => layout.category(e.key)));
  const categories = (layout.preferredCategories ?? []).filter((c) =>
    seen.has(c),
  );
  for (const c of seen) {
    if (!categories.includes(c)) categories.push(c);
  }

  const series: BarSeries[] = [];
  const byLabel = new Map<string, BarSeries>();
  for (const entry of entries) {
    const label = layout.series(entry.key);
    let row = byLabel.get(label);
    if (!row) {
      row = { label, bars: categories.map(() => null) };
      byLabel.set(label, row);
      series.push(row);
    }
    row.bars[categories.indexOf(layout.category(entry.key))] = toBarValue(
      entry.stats,
    );
  }

  return { type: "bar", ...meta, categories, series };
}

/** Percentile labels present on any bar, in first-seen order. */
export function percentileLabels(chart: BarChart): string[] {
  const labels: string[] = [];
  for (const series of chart.series) {
    for (const bar of series.bars) {
      for (const label of Object.keys(bar?.percentiles ?? {})) {
        if (!labels.includes(label)) labels.push(label);
      }
    }
  }
  return labels;
}

/**
 * Resolve a sample-index window against the reference series length.
 * `end` defaults to `length`; both bounds are clamped to [0, length].
 */
export function resolveWindow(
  length: number,
  start?: number,
  end?: number,
): ChartWindow {
  const clamp = (n: number) => Math.min(Math.max(n, 0), length);
  const s = clamp(start ?? 0);
  const e = clamp(end ?? length);
  return { start: s, end: Math.max(s, e) };
}
