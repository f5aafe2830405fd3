import type {
  BarChart,
  BarValue,
  FileFailure,
  LineChart,
  PipelineResult,
} from "../types";
import { percentileLabels } from "../chartModel";

/**
 * Bar label as drawn on the chart: `mean/std` with two decimals.
 */
export function formatBarLabel(bar: BarValue | null): string {
  if (bar === null) {
    return "-";
  }
  return `${bar.mean.toFixed(2)}/${bar.std.toFixed(2)}`;
}

function formatBarChart(chart: BarChart): string[] {
  const lines: string[] = [];

  lines.push(`| Series | ${chart.categories.join(" | ")} |`);
  lines.push(`|--------|${chart.categories.map(() => "------").join("|")}|`);
  for (const series of chart.series) {
    const cells = series.bars.map(formatBarLabel);
    lines.push(`| ${series.label} | ${cells.join(" | ")} |`);
  }
  lines.push("");
  lines.push(`_${chart.yLabel}_`);

  const columns = percentileLabels(chart);
  if (columns.length > 0) {
    lines.push("");
    lines.push("### Percentiles");
    lines.push("");
    lines.push(`| Series | Category | ${columns.join(" | ")} | Samples |`);
    lines.push(
      `|--------|----------|${columns.map(() => "-----").join("|")}|---------|`,
    );
    for (const series of chart.series) {
      series.bars.forEach((bar, i) => {
        if (bar === null) return;
        const values = columns.map((c) => {
          const v = bar.percentiles?.[c];
          return v !== undefined ? v.toFixed(2) : "-";
        });
        lines.push(
          `| ${series.label} | ${chart.categories[i]} | ${values.join(" | ")} | ${bar.count} |`,
        );
      });
    }
  }

  return lines;
}

function formatLineChart(chart: LineChart): string[] {
  const lines: string[] = [];

  lines.push(
    `x: ${chart.xLabel}, y: ${chart.yLabel}, window: [${chart.window.start}, ${chart.window.end})`,
  );
  lines.push("");
  lines.push("| Series | Points | Mean | Std | Min | Max |");
  lines.push("|--------|--------|------|-----|-----|-----|");
  for (const series of chart.series) {
    const label = series.emphasis ? `**${series.label}**` : series.label;
    const s = series.stats;
    const cells = s
      ? [s.mean, s.std, s.min, s.max].map((v) => v.toFixed(2))
      : ["-", "-", "-", "-"];
    lines.push(
      `| ${label} | ${series.samples.length} | ${cells.join(" | ")} |`,
    );
  }

  return lines;
}

function formatFailures(failures: FileFailure[]): string[] {
  const lines: string[] = [];
  lines.push(`## Skipped files (${failures.length})`);
  lines.push("");
  for (const f of failures) {
    lines.push(`- \`${f.file}\`: [${f.code}] ${f.message}`);
  }
  return lines;
}

/**
 * Formats a pipeline result as Markdown: one table for the chart, plus a
 * list of skipped files when any were left out.
 */
export function formatMarkdown(result: PipelineResult): string {
  const { chart } = result;
  const lines: string[] = [];

  lines.push(`# ${chart.title}`);
  lines.push("");
  lines.push(
    ...(chart.type === "bar" ? formatBarChart(chart) : formatLineChart(chart)),
  );

  if (result.failures.length > 0) {
    lines.push("");
    lines.push(...formatFailures(result.failures));
  }

  lines.push("");
  return lines.join("\n");
}
