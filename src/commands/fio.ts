import type { Logger } from "../logging";
import { runFio } from "../pipeline";
import { emitResult, resolveRunContext, type ReportOptions } from "./shared";

export async function fioCommand(
  options: ReportOptions,
  logger: Logger,
): Promise<void> {
  const ctx = await resolveRunContext(options);
  if (ctx.config.strict) {
    logger.debug("fio reports are always isolated; --strict does not apply");
  }

  const result = await runFio(ctx.root);
  await emitResult(result, ctx.format, options.output, logger);
}
