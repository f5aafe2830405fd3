import type { Logger } from "../logging";
import { runIperf } from "../pipeline";
import { emitResult, resolveRunContext, type ReportOptions } from "./shared";

export async function iperfCommand(
  options: ReportOptions,
  logger: Logger,
): Promise<void> {
  const ctx = await resolveRunContext(options);
  logger.debug(`iperf: scanning ${ctx.root}`);

  const result = await runIperf(ctx.root, { strict: ctx.config.strict });
  await emitResult(result, ctx.format, options.output, logger);
}
