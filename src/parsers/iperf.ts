import { parseJsonWithSchema } from "../fs/json";
import { IperfReportSchema } from "../schemas";
import type { IperfDirection } from "../stats/types";

export interface IperfTrial {
  direction: IperfDirection;
  /** MiB/s per measurement interval, in report order. */
  samples: number[];
}

export function bitsPerSecondToMiBs(bps: number): number {
  return bps / 8 / 1024 / 1024;
}

/**
 * Parse an iperf3 `--json` report. `reverse == 0` means the host sent to the
 * guest; any other value means the guest sent to the host.
 */
export function parseIperfReport(content: string, source: string): IperfTrial {
  const report = parseJsonWithSchema(content, source, IperfReportSchema);
  return {
    direction: report.start.test_start.reverse === 0 ? "h2g" : "g2h",
    samples: report.intervals.map((interval) =>
      bitsPerSecondToMiBs(interval.sum.bits_per_second),
    ),
  };
}
