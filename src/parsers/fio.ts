import { UnknownModeError } from "../errors";
import { parseJsonWithSchema } from "../fs/json";
import { FioReportSchema } from "../schemas";
import type { FioDirection } from "../stats/types";

export const KIB_PER_MIB = 1024;

/** Bandwidth of one fio trial, keyed by the job options that produced it. */
export interface FioSample {
  device: string;
  mode: string;
  blockSize: string;
  direction: FioDirection;
  /** MiB/s */
  bandwidth: number;
}

/**
 * Which side of the report carries the bandwidth for an fio `rw` mode:
 * `read`/`randread` read, `write`/`randwrite` write. Modes naming neither
 * return null.
 */
export function fioDirection(mode: string): FioDirection | null {
  if (mode.includes("read")) return "read";
  if (mode.includes("write")) return "write";
  return null;
}

/**
 * Parse an fio `--output-format=json` report. Only `jobs[0]` is read.
 *
 * @throws InvalidJsonError, SchemaValidationError, UnknownModeError
 */
export function parseFioReport(content: string, source: string): FioSample {
  const report = parseJsonWithSchema(content, source, FioReportSchema);
  const job = report.jobs[0];
  const options = job["job options"];
  const direction = fioDirection(options.rw);
  if (direction === null) {
    throw new UnknownModeError(source, options.rw);
  }

  return {
    device: options.filename,
    mode: options.rw,
    blockSize: options.bs,
    direction,
    bandwidth: job[direction].bw / KIB_PER_MIB,
  };
}
