import { InvalidArgumentError } from "commander";
import type { Logger } from "./logging";
import { toExitCode, isPerfstatError } from "./errors";

export interface CommandOptions {
  verbose?: boolean;
}

export async function executeCommand(
  fn: () => Promise<void>,
  logger: Logger,
  options: CommandOptions,
): Promise<void> {
  try {
    await fn();
  } catch (error) {
    handleError(error, logger, options);
    process.exit(toExitCode(error));
  }
}

export function handleError(
  error: unknown,
  logger: Logger,
  options: CommandOptions,
): void {
  if (isPerfstatError(error)) {
    logger.error(`[${error.code}] ${error.message}`);
  } else if (error instanceof Error) {
    logger.error(error.message);
    if (options.verbose) {
      logger.debug(error.stack || "");
    }
  } else {
    logger.error(String(error));
  }
}

/** commander argument parser for sample indices. */
export function parseIndex(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number.parseInt(value, 10);
}

/** commander argument parser for comma-separated lists. */
export function parseList(value: string): string[] {
  return value
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v !== "");
}
