import { Command } from "commander";
import { initLogger, logger } from "./logging";
import { toExitCode } from "./errors";
import { executeCommand, parseIndex, parseList } from "./cli-utils";
import {
  boottimeCommand,
  cpuCommand,
  fioCommand,
  iperfCommand,
  resourcesCommand,
  startupCommand,
  type ReportOptions,
} from "./commands";

interface GlobalOptions extends ReportOptions {
  verbose?: boolean;
  quiet?: boolean;
  debug?: boolean;
  color?: boolean;
}

interface SeriesFlags {
  path: string;
  start?: number;
  end?: number;
  values?: string;
}

export const program = new Command();

program
  .name("perfstat")
  .description(
    "Aggregate repeated VMM benchmark runs into mean/std statistics and chart data",
  )
  .version("0.1.0")
  .option("--verbose", "Enable verbose output")
  .option("--quiet", "Suppress non-essential output")
  .option("--debug", "Output structured JSON logs (ndjson format)")
  .option("--no-color", "Disable colored log output")
  .option("--cwd <path>", "Override the working directory")
  .option("-r, --results <dir>", "Results root directory (default: perf_results)")
  .option("-f, --format <format>", "Output format: json, md, csv (default: md)")
  .option("-o, --output <path>", 'Output file path, or "-" for stdout')
  .option("--strict", "Abort on the first malformed artifact instead of skipping it");

program
  .command("boottime")
  .description("Mean/std boot time per boottime result set")
  .option(
    "-p, --partition <tags>",
    "Comma-separated file-name tags splitting each set, e.g. drive,pmem",
    parseList,
  )
  .action(async (_options: unknown, cmd: Command) => {
    const opts = cmd.optsWithGlobals<GlobalOptions & { partition?: string[] }>();
    await executeCommand(() => boottimeCommand(opts, logger), logger, opts);
  });

program
  .command("startup")
  .description("Startup time mean/std and p50/p90/p99 per boottime result set")
  .action(async (_options: unknown, cmd: Command) => {
    const opts = cmd.optsWithGlobals<GlobalOptions>();
    await executeCommand(() => startupCommand(opts, logger), logger, opts);
  });

program
  .command("fio")
  .description("Block device bandwidth per device, mode and block size")
  .action(async (_options: unknown, cmd: Command) => {
    const opts = cmd.optsWithGlobals<GlobalOptions>();
    await executeCommand(() => fioCommand(opts, logger), logger, opts);
  });

program
  .command("iperf")
  .description("Network throughput per direction (h2g, g2h)")
  .action(async (_options: unknown, cmd: Command) => {
    const opts = cmd.optsWithGlobals<GlobalOptions>();
    await executeCommand(() => iperfCommand(opts, logger), logger, opts);
  });

program
  .command("cpu")
  .description("Per-core CPU utilization over time from a cpu_usage.txt log")
  .requiredOption("-p, --path <file>", "Path to the cpu_usage.txt file")
  .option("-s, --start <n>", "First sample index to include", parseIndex)
  .option("-e, --end <n>", "Sample index to stop before", parseIndex)
  .action(async (_options: unknown, cmd: Command) => {
    const opts = cmd.optsWithGlobals<GlobalOptions & SeriesFlags>();
    await executeCommand(() => cpuCommand(opts, logger), logger, opts);
  });

program
  .command("resources")
  .description("Process resource usage over iterations from a resource_usage.txt log")
  .requiredOption("-p, --path <file>", "Path to the resource_usage.txt file")
  .option("-s, --start <n>", "First iteration to include", parseIndex)
  .option("-e, --end <n>", "Iteration to stop before", parseIndex)
  .option("-v, --values <names>", "Only plot fields named in this list, e.g. utime,stime")
  .action(async (_options: unknown, cmd: Command) => {
    const opts = cmd.optsWithGlobals<GlobalOptions & SeriesFlags>();
    await executeCommand(() => resourcesCommand(opts, logger), logger, opts);
  });

export async function main(argv: string[] = process.argv): Promise<void> {
  program.hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    initLogger({
      verbose: opts.verbose,
      quiet: opts.quiet,
      debug: opts.debug,
      noColor: opts.color === false,
    });
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exit(toExitCode(error));
  }
}
