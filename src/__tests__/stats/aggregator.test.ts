import { describe, expect, it } from "vitest";
import { Aggregator } from "../../stats/aggregator";
import { groupKeyId, type BoottimeKey, type FioKey } from "../../stats/types";
import { AggregatorFinalizedError, EmptyGroupError } from "../../errors";

const runA: BoottimeKey = { kind: "boottime", run: "boottime_a" };
const runB: BoottimeKey = { kind: "boottime", run: "boottime_b" };

describe("groupKeyId", () => {
  it("serializes every key kind", () => {
    expect(groupKeyId(runA)).toBe("boottime:boottime_a");
    expect(groupKeyId({ ...runA, partition: "pmem" })).toBe(
      "boottime:boottime_a/pmem",
    );
    expect(groupKeyId({ kind: "startup", run: "r" })).toBe("startup:r");
    expect(
      groupKeyId({
        kind: "fio",
        run: "fio_1",
        device: "/dev/vda",
        mode: "randread",
        blockSize: "4k",
      }),
    ).toBe("fio:fio_1|/dev/vda|randread|4k");
    expect(groupKeyId({ kind: "iperf", run: "iperf_1", direction: "g2h" })).toBe(
      "iperf:iperf_1|g2h",
    );
    expect(
      groupKeyId({ kind: "series", source: "cpu_usage.txt", name: "cpu0" }),
    ).toBe("series:cpu_usage.txt|cpu0");
  });
});

describe("Aggregator", () => {
  it("groups samples by key in first-seen order", () => {
    const agg = new Aggregator<BoottimeKey>();
    agg.add(runB, 10);
    agg.add(runA, 100);
    agg.add({ kind: "boottime", run: "boottime_a" }, 200);

    const entries = agg.finalize();
    expect(entries.map((e) => e.id)).toEqual([
      "boottime:boottime_b",
      "boottime:boottime_a",
    ]);
    expect(entries[1]?.stats.mean).toBe(150);
    expect(entries[1]?.stats.std).toBe(50);
    expect(entries[1]?.stats.count).toBe(2);
  });

  it("adds many samples at once", () => {
    const agg = new Aggregator<BoottimeKey>();
    agg.addAll(runA, [1, 2, 3]);
    expect(agg.samples(runA)).toEqual([1, 2, 3]);
    expect(agg.size).toBe(1);
    expect(agg.keys()).toEqual([runA]);
  });

  it("computes percentiles when asked", () => {
    const key: FioKey = {
      kind: "fio",
      run: "fio_1",
      device: "/dev/vda",
      mode: "read",
      blockSize: "4k",
    };
    const agg = new Aggregator<FioKey>();
    agg.addAll(key, [1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    const [entry] = agg.finalize({ percentiles: [50] });
    expect(entry?.stats.percentiles).toEqual({ p50: 5.5 });
  });

  it("returns the same frozen result on every finalize", () => {
    const agg = new Aggregator<BoottimeKey>();
    agg.add(runA, 1);
    const first = agg.finalize();
    expect(agg.finalize()).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(agg.finalized).toBe(true);
  });

  it("rejects samples after finalize", () => {
    const agg = new Aggregator<BoottimeKey>();
    agg.add(runA, 1);
    agg.finalize();
    expect(() => agg.add(runA, 2)).toThrow(AggregatorFinalizedError);
    expect(() => agg.register(runB)).toThrow(AggregatorFinalizedError);
  });

  it("fails to finalize a registered key without samples", () => {
    const agg = new Aggregator<BoottimeKey>();
    agg.add(runA, 1);
    agg.register(runB);
    expect(() => agg.finalize()).toThrow(EmptyGroupError);
    expect(agg.finalized).toBe(false);
  });

  it("finalizes to nothing when nothing was added", () => {
    expect(new Aggregator<BoottimeKey>().finalize()).toEqual([]);
  });
});
