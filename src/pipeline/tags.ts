/** Substrings identifying artifact kinds in directory and file names. */
export const Tags = {
  BOOTTIME: "boottime",
  STARTUP_TIME: "startup_time",
  FIO: "fio",
  IPERF: "iperf",
} as const;

/** Aggregate line in `/proc/stat`; sets the time axis of CPU charts. */
export const AGGREGATE_CPU = "cpu";

/** rusage field that sets the iteration axis of resource charts. */
export const REFERENCE_RESOURCE = "utime";

export const FIO_MODE_ORDER = ["read", "write", "randread", "randwrite"] as const;

export const IPERF_DIRECTION_ORDER = ["h2g", "g2h"] as const;
