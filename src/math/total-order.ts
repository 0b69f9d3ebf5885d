/**
 * IEEE-754 totalOrder comparison for doubles
 *
 * Orders `-NaN < -Infinity < ... < -0 < +0 < ... < Infinity < NaN`, so sorting
 * and arg-max never see an undefined comparison.
 *
 * @module math
 */

const view = new DataView(new ArrayBuffer(8));

function signBit(value: number): boolean {
  view.setFloat64(0, value);
  return (view.getUint8(0) & 0x80) !== 0;
}

/** -1 for negative NaN, 1 for positive NaN, 0 for ordinary values */
function nanRank(value: number): number {
  if (!Number.isNaN(value)) return 0;
  return signBit(value) ? -1 : 1;
}

/**
 * Compare two doubles under IEEE-754 totalOrder
 *
 * @returns negative, zero or positive like `Array.prototype.sort` comparators
 */
export function totalCompare(a: number, b: number): number {
  const rankA = nanRank(a);
  const rankB = nanRank(b);
  if (rankA !== rankB) return rankA < rankB ? -1 : 1;
  if (rankA !== 0) return 0;

  if (a < b) return -1;
  if (a > b) return 1;

  // Only ±0 remain equal-but-distinct
  const negA = Object.is(a, -0);
  const negB = Object.is(b, -0);
  if (negA === negB) return 0;
  return negA ? -1 : 1;
}
