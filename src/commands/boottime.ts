import type { Logger } from "../logging";
import { runBoottime } from "../pipeline";
import { emitResult, resolveRunContext, type ReportOptions } from "./shared";

export interface BoottimeCommandOptions extends ReportOptions {
  partition?: string[];
}

export async function boottimeCommand(
  options: BoottimeCommandOptions,
  logger: Logger,
): Promise<void> {
  const ctx = await resolveRunContext(options, {
    boottimePartitions: options.partition,
  });
  logger.debug(`boottime: scanning ${ctx.root}`);

  const result = await runBoottime(ctx.root, {
    strict: ctx.config.strict,
    partitions: ctx.config.boottime_partitions,
  });
  await emitResult(result, ctx.format, options.output, logger);
}
