import type { PipelineResult } from "../types";

/**
 * Formats a pipeline result as JSON.
 * Uses 2-space indentation for readability.
 */
export function formatJson(result: PipelineResult): string {
  return JSON.stringify(result, null, 2);
}
