import { AggregatorFinalizedError } from "../errors";
import { computeStats } from "./statistics";
import {
  groupKeyId,
  type AggregateEntry,
  type GroupKey,
} from "./types";

export interface FinalizeOptions {
  /** Percentiles to compute for every group, e.g. `[50, 90, 99]`. */
  percentiles?: readonly number[];
}

interface Bucket<K extends GroupKey> {
  key: K;
  samples: number[];
}

/**
 * Collects samples per group key, then turns them into frozen statistics.
 *
 * Groups keep the order in which their key was first seen. Once finalized,
 * the aggregator rejects new samples and returns the same entries on every
 * later `finalize()` call.
 */
export class Aggregator<K extends GroupKey> {
  private readonly buckets = new Map<string, Bucket<K>>();
  private result: readonly AggregateEntry<K>[] | null = null;

  private bucket(key: K): Bucket<K> {
    if (this.result !== null) {
      throw new AggregatorFinalizedError();
    }
    const id = groupKeyId(key);
    let bucket = this.buckets.get(id);
    if (!bucket) {
      bucket = { key, samples: [] };
      this.buckets.set(id, bucket);
    }
    return bucket;
  }

  /**
   * Register a key that must end up with samples; finalize() throws
   * EmptyGroupError if it does not.
   */
  register(key: K): void {
    this.bucket(key);
  }

  add(key: K, sample: number): void {
    this.bucket(key).samples.push(sample);
  }

  addAll(key: K, samples: Iterable<number>): void {
    const bucket = this.bucket(key);
    for (const sample of samples) {
      bucket.samples.push(sample);
    }
  }

  keys(): K[] {
    return [...this.buckets.values()].map((b) => b.key);
  }

  samples(key: K): readonly number[] {
    return this.buckets.get(groupKeyId(key))?.samples ?? [];
  }

  get size(): number {
    return this.buckets.size;
  }

  get finalized(): boolean {
    return this.result !== null;
  }

  finalize(options: FinalizeOptions = {}): readonly AggregateEntry<K>[] {
    if (this.result !== null) {
      return this.result;
    }

    const entries: AggregateEntry<K>[] = [];
    for (const [id, bucket] of this.buckets) {
      entries.push(
        Object.freeze({
          id,
          key: bucket.key,
          stats: computeStats(bucket.samples, options.percentiles, id),
        }),
      );
    }

    this.result = Object.freeze(entries);
    return this.result;
  }
}
