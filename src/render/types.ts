import type { AggregateStat, Percentiles, Unit } from "../stats/types";

export interface BarValue {
  mean: number;
  std: number;
  count: number;
  percentiles?: Percentiles;
}

export interface BarSeries {
  label: string;
  /** One entry per chart category; null where the series has no data. */
  bars: (BarValue | null)[];
}

/** Grouped bars with error bars: one group per category, one bar per series. */
export interface BarChart {
  type: "bar";
  title: string;
  yLabel: string;
  unit: Unit;
  categories: string[];
  series: BarSeries[];
}

export interface LineSeries {
  label: string;
  /** Samples inside the chart window, in sampling order. */
  samples: number[];
  /** Drawn heavier, e.g. the aggregate `cpu` line. */
  emphasis: boolean;
  /** Summary of the windowed samples; null for an empty window. */
  stats: AggregateStat | null;
}

/** Sample-index window [start, end) applied to every series. */
export interface ChartWindow {
  start: number;
  end: number;
}

export interface LineChart {
  type: "line";
  title: string;
  xLabel: string;
  yLabel: string;
  unit: Unit;
  window: ChartWindow;
  series: LineSeries[];
}

export type ChartModel = BarChart | LineChart;

/** A file left out of the aggregate, with the reason. */
export interface FileFailure {
  file: string;
  code: string;
  message: string;
}

export interface PipelineResult {
  chart: ChartModel;
  failures: FileFailure[];
}
