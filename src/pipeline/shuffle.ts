import type { MetricKey, MetricPair } from './metrics.js';

/**
 * Wraps a finite sequence so it can be iterated exactly once, the way a
 * reducer receives its grouped values.
 */
export class SinglePassIterable<T> implements Iterable<T> {
  private consumed = false;

  constructor(private readonly source: Iterable<T>) {}

  [Symbol.iterator](): Iterator<T> {
    if (this.consumed) {
      throw new Error('Value sequence has already been consumed');
    }
    this.consumed = true;
    return this.source[Symbol.iterator]();
  }
}

// In-process stand-in for the key-grouping stage between classify and aggregate
export class Shuffle {
  private readonly buckets = new Map<MetricKey, number[]>();

  emit([key, value]: MetricPair): void {
    const bucket = this.buckets.get(key);
    if (bucket) {
      bucket.push(value);
    } else {
      this.buckets.set(key, [value]);
    }
  }

  emitAll(pairs: Iterable<MetricPair>): void {
    for (const pair of pairs) {
      this.emit(pair);
    }
  }

  /** Yields each key once, in ascending key order, with its values as a single-pass sequence. */
  *groups(): IterableIterator<[MetricKey, SinglePassIterable<number>]> {
    const keys = [...this.buckets.keys()].sort();
    for (const key of keys) {
      const values = this.buckets.get(key) ?? [];
      yield [key, new SinglePassIterable(values)];
    }
  }
}
