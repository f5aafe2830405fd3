import * as path from "node:path";
import type { Logger } from "../logging";
import { resolveCwd } from "../fs/paths";
import { runCpuUsage, runResourceUsage } from "../pipeline";
import { emitResult, resolveRunContext, type ReportOptions } from "./shared";

export interface SeriesCommandOptions extends ReportOptions {
  path: string;
  start?: number;
  end?: number;
}

export interface ResourcesCommandOptions extends SeriesCommandOptions {
  values?: string;
}

function resolveLogPath(options: SeriesCommandOptions): string {
  return path.resolve(resolveCwd(options.cwd), options.path);
}

export async function cpuCommand(
  options: SeriesCommandOptions,
  logger: Logger,
): Promise<void> {
  const ctx = await resolveRunContext(options);
  const file = resolveLogPath(options);
  logger.debug(`cpu: reading ${file}`);

  const result = await runCpuUsage(file, {
    start: options.start,
    end: options.end,
  });
  await emitResult(result, ctx.format, options.output, logger);
}

export async function resourcesCommand(
  options: ResourcesCommandOptions,
  logger: Logger,
): Promise<void> {
  const ctx = await resolveRunContext(options);
  const file = resolveLogPath(options);
  logger.debug(`resources: reading ${file}`);

  const result = await runResourceUsage(file, {
    start: options.start,
    end: options.end,
    values: options.values,
  });
  await emitResult(result, ctx.format, options.output, logger);
}
