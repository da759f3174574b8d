import type { SummaryStats } from "./types.ts";

/**
 * Round to a fixed number of decimals for display and reports.
 * Example: round(85.666666) = 85.67
 */
export function round(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function sum(values: readonly number[]): number {
  return values.reduce((acc, value) => acc + value, 0);
}

/**
 * Arithmetic mean. An empty list has no mean, so callers get 0 back
 * and are expected to check the count first.
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return sum(values) / values.length;
}

/**
 * Sorted middle value, or the average of the two middles for an even count.
 * Example: median([3, 1, 2]) = 2, median([4, 1, 3, 2]) = 2.5
 */
export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;

  // Copy before sorting so the caller's array is untouched
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);

  if (sorted.length % 2 === 0) {
    return (sorted[middle - 1] + sorted[middle]) / 2;
  }
  return sorted[middle];
}

/**
 * Population standard deviation.
 */
export function stdDev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const avg = mean(values);
  const variance = mean(values.map((value) => (value - avg) ** 2));
  return Math.sqrt(variance);
}

/**
 * Count, mean, median, min, max, sum and standard deviation in one pass over the data.
 * Returns undefined for an empty list: there is nothing to summarize.
 */
export function summarize(values: readonly number[]): SummaryStats | undefined {
  if (values.length === 0) return undefined;

  const min = values.reduce((acc, value) => (value < acc ? value : acc), values[0]);
  const max = values.reduce((acc, value) => (value > acc ? value : acc), values[0]);

  return {
    count: values.length,
    mean: mean(values),
    median: median(values),
    min,
    max,
    sum: sum(values),
    stdDev: stdDev(values),
  };
}

// Natural ordering for group keys: numbers numerically, strings lexically
function compareKeys<K extends string | number>(a: K, b: K): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  return String(a) < String(b) ? -1 : String(a) > String(b) ? 1 : 0;
}

/**
 * Group items by a key. The returned Map iterates in ascending key order
 * and keeps the input order inside each group.
 */
export function groupBy<T, K extends string | number>(
  items: readonly T[],
  key: (item: T) => K,
): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const groupKey = key(item);
    const bucket = groups.get(groupKey);
    if (bucket) {
      bucket.push(item);
    } else {
      groups.set(groupKey, [item]);
    }
  }

  const orderedKeys = [...groups.keys()].sort(compareKeys);
  return new Map(orderedKeys.map((groupKey): [K, T[]] => [groupKey, groups.get(groupKey) ?? []]));
}
