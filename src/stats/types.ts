export type Unit = "ms" | "us" | "MiB/s" | "%" | "count";

export type IperfDirection = "h2g" | "g2h";

export type FioDirection = "read" | "write";

export interface BoottimeKey {
  kind: "boottime";
  run: string;
  partition?: string;
}

export interface StartupKey {
  kind: "startup";
  run: string;
}

export interface FioKey {
  kind: "fio";
  run: string;
  device: string;
  mode: string;
  blockSize: string;
}

export interface IperfKey {
  kind: "iperf";
  run: string;
  direction: IperfDirection;
}

/** One named time series: a CPU core id or an rusage field. */
export interface SeriesKey {
  kind: "series";
  source: string;
  name: string;
}

export type GroupKey = BoottimeKey | StartupKey | FioKey | IperfKey | SeriesKey;

export type Percentiles = Readonly<Record<string, number>>;

export interface AggregateStat {
  readonly mean: number;
  readonly std: number;
  readonly count: number;
  readonly min: number;
  readonly max: number;
  /** Keyed `p50`, `p90`, ... when requested. */
  readonly percentiles?: Percentiles;
}

export interface AggregateEntry<K extends GroupKey> {
  readonly id: string;
  readonly key: K;
  readonly stats: AggregateStat;
}

export function groupKeyId(key: GroupKey): string {
  switch (key.kind) {
    case "boottime":
      return key.partition !== undefined
        ? `boottime:${key.run}/${key.partition}`
        : `boottime:${key.run}`;
    case "startup":
      return `startup:${key.run}`;
    case "fio":
      return `fio:${key.run}|${key.device}|${key.mode}|${key.blockSize}`;
    case "iperf":
      return `iperf:${key.run}|${key.direction}`;
    case "series":
      return `series:${key.source}|${key.name}`;
  }
}
