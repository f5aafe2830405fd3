import type { OutputFormat } from "../schemas";
import { formatCsv, formatJson, formatMarkdown } from "./reporters";
import type { PipelineResult } from "./types";

export * from "./types";
export * from "./reporters";
export * from "./chartModel";

/**
 * Formats a pipeline result using the specified output format.
 */
export function formatOutput(
  result: PipelineResult,
  format: OutputFormat,
): string {
  switch (format) {
    case "json":
      return formatJson(result);
    case "md":
      return formatMarkdown(result);
    case "csv":
      return formatCsv(result);
  }
}
