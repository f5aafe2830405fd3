import * as fs from "node:fs/promises";
import { applyOverrides, loadConfig, type ConfigResolved } from "../config";
import { ConfigError, wrapError } from "../errors";
import { resolveCwd, resolveResultsRoot } from "../fs/paths";
import type { Logger } from "../logging";
import { formatOutput } from "../render";
import type { PipelineResult } from "../render/types";
import { OutputFormatSchema, type OutputFormat } from "../schemas";

/** Options every subcommand accepts (set globally on the program). */
export interface ReportOptions {
  cwd?: string;
  results?: string;
  format?: string;
  output?: string;
  strict?: boolean;
}

export interface RunContext {
  config: ConfigResolved;
  /** Absolute results root. */
  root: string;
  format: OutputFormat;
}

export function parseFormat(value: string | undefined): OutputFormat | undefined {
  if (value === undefined) return undefined;
  const result = OutputFormatSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(
      `Unknown output format '${value}'. Expected one of: ${OutputFormatSchema.options.join(", ")}`,
    );
  }
  return result.data;
}

export async function resolveRunContext(
  options: ReportOptions,
  extra: { boottimePartitions?: string[] } = {},
): Promise<RunContext> {
  const cwd = resolveCwd(options.cwd);
  const config = applyOverrides(await loadConfig(cwd), {
    resultsDir: options.results,
    outputFormat: parseFormat(options.format),
    strict: options.strict,
    boottimePartitions: extra.boottimePartitions,
  });
  return {
    config,
    root: resolveResultsRoot(cwd, config.results_dir),
    format: config.output_format,
  };
}

/**
 * Render `result` and write it to `output` (a path, or stdout for "-" or
 * undefined). Skipped files are summarized as a warning.
 */
export async function emitResult(
  result: PipelineResult,
  format: OutputFormat,
  output: string | undefined,
  logger: Logger,
): Promise<void> {
  const text = formatOutput(result, format);

  if (output === undefined || output === "-") {
    console.log(text);
  } else {
    try {
      await fs.writeFile(output, text, "utf-8");
    } catch (err) {
      throw wrapError(err, `Failed to write ${output}`);
    }
    logger.info(`Results written to ${output}`);
  }

  if (result.failures.length > 0) {
    logger.warn(
      `${result.failures.length} file(s) skipped; see the report for details`,
    );
  }
}
