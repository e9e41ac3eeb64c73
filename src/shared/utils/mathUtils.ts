/**
 * Shared math utilities for mass bookkeeping.
 *
 * @module shared/utils/mathUtils
 */

/** Tolerance under which accumulated probabilities count as having reached 1. */
export const PROBABILITY_EPSILON = 1e-9;

/**
 * Sums values with Neumaier compensation so long runs of small masses do
 * not drift.
 *
 * @param values - Values to add
 * @returns The compensated sum
 */
export function fsum(values: Iterable<number>): number {
  let sum = 0;
  let compensation = 0;
  for (const v of values) {
    const t = sum + v;
    if (Math.abs(sum) >= Math.abs(v)) {
      compensation += sum - t + v;
    } else {
      compensation += v - t + sum;
    }
    sum = t;
  }
  return sum + compensation;
}

/**
 * Rounds values to integers while preserving their total (largest-remainder
 * method).
 *
 * Every value is floored, then the units still missing from the rounded
 * total are handed to the values with the largest fractional remainders.
 * Equal remainders go to the value that comes first.
 *
 * @param values - Non-negative values to round
 * @returns Integers whose sum equals `Math.round` of the exact sum
 */
export function roundPreservingTotal(values: readonly number[]): number[] {
  const floors = values.map((v) => Math.floor(v));
  const target = Math.round(fsum(values));
  let missing = target - floors.reduce((acc, v) => acc + v, 0);

  const order = values
    .map((v, i) => ({ i, remainder: v - floors[i] }))
    .sort((a, b) => b.remainder - a.remainder || a.i - b.i);

  const result = [...floors];
  for (let k = 0; missing > 0 && k < order.length; k++, missing--) {
    result[order[k].i] += 1;
  }
  return result;
}

/**
 * Cartesian product of a list of lists.
 *
 * `cartesianProduct([[a, b], [c]])` yields `[[a, c], [b, c]]`; the last list
 * varies fastest. An empty input yields a single empty tuple.
 */
export function cartesianProduct<T>(lists: readonly (readonly T[])[]): T[][] {
  let tuples: T[][] = [[]];
  for (const list of lists) {
    const next: T[][] = [];
    for (const tuple of tuples) {
      for (const item of list) {
        next.push([...tuple, item]);
      }
    }
    tuples = next;
  }
  return tuples;
}
