/**
 * Partial sort tests
 */

import { describe, it, expect } from 'vitest';
import { partialSort, partialSortNumbers } from './partial-sort';
import { createRng } from '../random/rng';

const ascending = (a: number, b: number) => a - b;

describe('partialSort', () => {
  it('should sort the first k elements', () => {
    const values = [1.0, 5.0, 4.0, 7.0, 3.0];
    partialSortNumbers(values, 3);

    expect(values.slice(0, 3)).toEqual([1.0, 3.0, 4.0]);
  });

  it('should leave the tail in the order the scans produce', () => {
    const values = [1, 5, 4, 7, 3];
    partialSort(values, 3, ascending);

    expect(values).toEqual([1, 3, 4, 5, 7]);
  });

  it('should be a no-op for k = 0', () => {
    const values = [3, 1, 2];
    partialSort(values, 0, ascending);

    expect(values).toEqual([3, 1, 2]);
  });

  it('should fully sort for k = n', () => {
    const values = [9, -1, 4, 4, 0, 2];
    partialSort(values, values.length, ascending);

    expect(values).toEqual([-1, 0, 2, 4, 4, 9]);
  });

  it('should clamp k to the array length', () => {
    const values = [2, 1];
    expect(partialSort(values, 10, ascending)).toEqual([1, 2]);
    expect(partialSort([], 3, ascending)).toEqual([]);
  });

  it('should keep the k smallest and preserve the multiset', () => {
    const rng = createRng(7);
    for (let round = 0; round < 20; round++) {
      const original = Array.from({ length: 25 }, () => Math.floor(rng() * 50));
      const k = Math.floor(rng() * 26);
      const values = [...original];

      partialSort(values, k, ascending);

      const sorted = [...original].sort(ascending);
      expect(values.slice(0, k)).toEqual(sorted.slice(0, k));
      expect([...values].sort(ascending)).toEqual(sorted);
    }
  });

  it('should order NaN last under totalOrder', () => {
    const values = [NaN, 2, -1];
    partialSortNumbers(values, 2);

    expect(values.slice(0, 2)).toEqual([-1, 2]);
    expect(values[2]).toBeNaN();
  });

  it('should order objects by a key', () => {
    const items = [{ d: 3 }, { d: 1 }, { d: 2 }];
    partialSort(items, 1, (a, b) => a.d - b.d);

    expect(items[0]).toEqual({ d: 1 });
  });
});
