import type { BarChart, LineChart, PipelineResult } from "../types";
import { percentileLabels } from "../chartModel";

/**
 * Escapes a value for CSV output.
 * Wraps values containing commas, quotes, or newlines in double quotes.
 */
function escapeCSV(value: string): string {
  if (value.includes(",") || value.includes('"') || value.includes("\n")) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Formats a numeric value with 6 decimal places for CSV output.
 */
function formatValue(value: number): string {
  return value.toFixed(6);
}

function barRows(chart: BarChart): string[] {
  const percentiles = percentileLabels(chart);

  const lines = [
    ["series", "category", "mean", "std", "count", ...percentiles, "unit"].join(
      ",",
    ),
  ];
  for (const series of chart.series) {
    series.bars.forEach((bar, i) => {
      if (bar === null) return;
      const row = [
        escapeCSV(series.label),
        escapeCSV(chart.categories[i] ?? ""),
        formatValue(bar.mean),
        formatValue(bar.std),
        bar.count.toString(),
        ...percentiles.map((p) => {
          const v = bar.percentiles?.[p];
          return v !== undefined ? formatValue(v) : "";
        }),
        escapeCSV(chart.unit),
      ];
      lines.push(row.join(","));
    });
  }
  return lines;
}

function lineRows(chart: LineChart): string[] {
  const lines = ["series,index,value,unit"];
  for (const series of chart.series) {
    series.samples.forEach((value, i) => {
      lines.push(
        [
          escapeCSV(series.label),
          (chart.window.start + i).toString(),
          formatValue(value),
          escapeCSV(chart.unit),
        ].join(","),
      );
    });
  }
  return lines;
}

/**
 * Formats a chart as CSV: one row per bar, or one row per windowed sample
 * of each line series. Skipped files are not part of the CSV.
 */
export function formatCsv(result: PipelineResult): string {
  const { chart } = result;
  const lines = chart.type === "bar" ? barRows(chart) : lineRows(chart);
  return lines.join("\n");
}
