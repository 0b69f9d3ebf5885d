/**
 * Partial sort (selection)
 *
 * Orders only the `k` smallest elements of an array. Each round scans from
 * the end of the array back to position `i`, swapping adjacent out-of-order
 * pairs so the minimum of the unsorted remainder bubbles down to `i`.
 *
 * **Complexity:** `O(k·n)` comparisons, against `O(n log n)` for a full sort;
 * k-NN only ever needs the `k` closest points and `k` is usually small.
 *
 * @module sort
 *
 * @example
 * ```typescript
 * const values = [1, 5, 4, 7, 3];
 * partialSort(values, 3, (a, b) => a - b);
 * values.slice(0, 3); // [1, 3, 4]
 * ```
 */

import { totalCompare } from '../math/total-order';

export type Comparator<T> = (a: T, b: T) => number;

/**
 * Rearrange `items` in place so `items[0..k)` holds the `k` smallest
 * elements in ascending order; the rest are left in unspecified order.
 *
 * `compare` must be a strict total order. `k` larger than the array is
 * treated as a full sort.
 */
export function partialSort<T>(items: T[], k: number, compare: Comparator<T>): T[] {
  const rounds = Math.min(k, items.length);

  for (let i = 0; i < rounds; i++) {
    for (let j = items.length - 2; j >= i; j--) {
      if (compare(items[j], items[j + 1]) > 0) {
        const tmp = items[j];
        items[j] = items[j + 1];
        items[j + 1] = tmp;
      }
    }
  }

  return items;
}

/**
 * Partial sort of doubles under IEEE-754 totalOrder
 */
export function partialSortNumbers(items: number[], k: number): number[] {
  return partialSort(items, k, totalCompare);
}
