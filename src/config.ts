import { ConfigSchema, type Config, type OutputFormat } from "./schemas";
import { getConfigPath } from "./fs/paths";
import { parseJsonWithSchema } from "./fs/json";
import { tryReadFile } from "./fs/util";

export interface ConfigResolved {
  schema_version: number;
  results_dir: string;
  output_format: OutputFormat;
  strict: boolean;
  percentiles: number[];
  boottime_partitions: string[];
}

export interface ConfigOverrides {
  resultsDir?: string;
  outputFormat?: OutputFormat;
  strict?: boolean;
  boottimePartitions?: string[];
}

export const DEFAULT_CONFIG: ConfigResolved = {
  schema_version: 1,
  results_dir: "perf_results",
  output_format: "md",
  strict: false,
  percentiles: [50, 90, 99],
  boottime_partitions: [],
};

export function mergeWithDefaults(partial: Config): ConfigResolved {
  return {
    schema_version: partial.schema_version ?? DEFAULT_CONFIG.schema_version,
    results_dir: partial.results_dir ?? DEFAULT_CONFIG.results_dir,
    output_format: partial.output_format ?? DEFAULT_CONFIG.output_format,
    strict: partial.strict ?? DEFAULT_CONFIG.strict,
    percentiles: partial.percentiles ?? [...DEFAULT_CONFIG.percentiles],
    boottime_partitions:
      partial.boottime_partitions ?? [...DEFAULT_CONFIG.boottime_partitions],
  };
}

export function applyOverrides(
  config: ConfigResolved,
  overrides: ConfigOverrides,
): ConfigResolved {
  return {
    ...config,
    results_dir: overrides.resultsDir ?? config.results_dir,
    output_format: overrides.outputFormat ?? config.output_format,
    strict: overrides.strict ?? config.strict,
    boottime_partitions:
      overrides.boottimePartitions ?? config.boottime_partitions,
  };
}

/**
 * Load `perfstat.config.json` from `cwd`. A missing file yields the defaults;
 * unreadable, malformed or invalid files throw.
 */
export async function loadConfig(
  cwd: string,
  overrides?: ConfigOverrides,
): Promise<ConfigResolved> {
  const configPath = getConfigPath(cwd);
  const read = await tryReadFile(configPath);

  let partial: Config = {};
  if (read.status === "error") {
    throw read.error;
  }
  if (read.status === "ok") {
    partial = parseJsonWithSchema(read.content, configPath, ConfigSchema);
  }

  const config = mergeWithDefaults(partial);
  return overrides ? applyOverrides(config, overrides) : config;
}
