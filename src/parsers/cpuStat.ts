import { ParseError } from "../errors";
import { splitLines } from "./text";

export const COUNTER_FIELDS = [
  "user",
  "nice",
  "system",
  "idle",
  "iowait",
  "irq",
  "softirq",
  "steal",
  "guest",
  "guestNice",
] as const;

export type CounterField = (typeof COUNTER_FIELDS)[number];

/**
 * One `/proc/stat` cpu line: cumulative ticks per accounting bucket.
 * `core` is `"cpu"` for the aggregate line, `"cpu0"`, `"cpu1"`, ... per core.
 */
export type CounterSnapshot = { core: string } & Record<CounterField, number>;

const COUNTER = /^\d+$/;

export function parseCounterLine(
  line: string,
  source: string,
  lineNo?: number,
): CounterSnapshot {
  const [core, ...values] = line.trim().split(/\s+/);
  if (core === undefined || core === "") {
    throw new ParseError(source, "missing core identifier", lineNo);
  }
  if (values.length !== COUNTER_FIELDS.length) {
    throw new ParseError(
      source,
      `expected ${COUNTER_FIELDS.length} counters for ${core}, got ${values.length}`,
      lineNo,
    );
  }

  const snapshot: CounterSnapshot = {
    core,
    user: 0,
    nice: 0,
    system: 0,
    idle: 0,
    iowait: 0,
    irq: 0,
    softirq: 0,
    steal: 0,
    guest: 0,
    guestNice: 0,
  };
  COUNTER_FIELDS.forEach((field, i) => {
    const raw = values[i] ?? "";
    if (!COUNTER.test(raw)) {
      throw new ParseError(
        source,
        `counter '${field}' of ${core} is not a non-negative integer: '${raw}'`,
        lineNo,
      );
    }
    snapshot[field] = Number.parseInt(raw, 10);
  });
  return snapshot;
}

/**
 * Parse a CPU accounting log into snapshots per core, in arrival order.
 * Map iteration order is the order in which each core first appeared.
 */
export function parseCpuStat(
  content: string,
  source: string,
): Map<string, CounterSnapshot[]> {
  const byCore = new Map<string, CounterSnapshot[]>();

  splitLines(content).forEach((line, index) => {
    if (line.trim() === "") return;
    const snapshot = parseCounterLine(line, source, index + 1);
    const list = byCore.get(snapshot.core);
    if (list) {
      list.push(snapshot);
    } else {
      byCore.set(snapshot.core, [snapshot]);
    }
  });

  return byCore;
}

/** Ticks spent on non-idle work, excluding time accounted to guests. */
export function workTime(s: CounterSnapshot): number {
  return s.user + s.nice + s.system + s.irq + s.softirq - s.guest - s.guestNice;
}

export function totalTime(s: CounterSnapshot): number {
  return workTime(s) + s.idle + s.iowait + s.guest + s.guestNice + s.steal;
}

/**
 * `a - b` when the counter advanced, otherwise `fallback`. A counter that
 * stalls or goes backwards (reset, wraparound) counts as no progress.
 */
export function counterDiff(a: number, b: number, fallback: number): number {
  return b < a ? a - b : fallback;
}

/** CPU usage in percent between two snapshots of the same core. */
export function usage(newer: CounterSnapshot, older: CounterSnapshot): number {
  return (
    (counterDiff(workTime(newer), workTime(older), 0) /
      counterDiff(totalTime(newer), totalTime(older), 1)) *
    100
  );
}

/** Usage per consecutive snapshot pair; one shorter than the input. */
export function usageSeries(snapshots: readonly CounterSnapshot[]): number[] {
  const series: number[] = [];
  for (let i = 1; i < snapshots.length; i++) {
    const older = snapshots[i - 1];
    const newer = snapshots[i];
    if (older && newer) {
      series.push(usage(newer, older));
    }
  }
  return series;
}

export function cpuUsageByCore(
  byCore: ReadonlyMap<string, readonly CounterSnapshot[]>,
): Map<string, number[]> {
  const result = new Map<string, number[]>();
  for (const [core, snapshots] of byCore) {
    result.set(core, usageSeries(snapshots));
  }
  return result;
}
