import type { Logger } from "../logging";
import { runStartupTime } from "../pipeline";
import { emitResult, resolveRunContext, type ReportOptions } from "./shared";

export async function startupCommand(
  options: ReportOptions,
  logger: Logger,
): Promise<void> {
  const ctx = await resolveRunContext(options);
  logger.debug(`startup: scanning ${ctx.root}`);

  const result = await runStartupTime(ctx.root, {
    strict: ctx.config.strict,
    percentiles: ctx.config.percentiles,
  });
  await emitResult(result, ctx.format, options.output, logger);
}
