import type { MetricKey } from './metrics.js';

export interface AggregateResult {
  key: MetricKey;
  average: number;
}

/**
 * Rounds to two decimals: the scaled value goes to the nearest integer with
 * ties toward +Infinity (0.125 -> 0.13, -0.125 -> -0.12). A rounded zero is
 * always +0.
 */
export function roundToCents(value: number): number {
  const cents = Math.round(value * 100);
  return cents === 0 ? 0 : cents / 100;
}

/**
 * Running sum/count for one metric key. Partial accumulators built over
 * disjoint partitions can be merged in any order before the final average.
 */
export class Accumulator {
  private sum = 0;
  private count = 0;

  add(value: number): this {
    this.sum += value;
    this.count++;
    return this;
  }

  merge(other: Accumulator): this {
    this.sum += other.sum;
    this.count += other.count;
    return this;
  }

  get size(): number {
    return this.count;
  }

  average(): number {
    return this.count > 0 ? roundToCents(this.sum / this.count) : 0;
  }
}

// Walks `values` exactly once; an empty sequence averages to 0
export function aggregate(key: MetricKey, values: Iterable<number>): AggregateResult {
  const accumulator = new Accumulator();
  for (const value of values) {
    accumulator.add(value);
  }
  return { key, average: accumulator.average() };
}

export function formatAverage(average: number): string {
  return average.toFixed(2);
}
