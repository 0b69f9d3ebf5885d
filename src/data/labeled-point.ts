/**
 * Labeled point parsing and formatting
 *
 * **Line format:** whitespace-separated tokens; every token but the last is
 * a vector component (`re` or `re+imi`), the last one is the label.
 *
 * @module data
 *
 * @example
 * ```typescript
 * const p = parseLabeledPoint('0.954+0.3i   1.0   0.7   red', stringLabel);
 * p.label;             // 'red'
 * p.point.dimension;   // 3
 * ```
 */

import type { Label, LabeledPoint } from '../types';
import { Complex } from '../math/complex';
import { Point } from '../math/point';
import { ParseError } from '../utils/errors';
import type { LabelCodec } from './label';

/**
 * Create a labeled point from real components
 */
export function labeled<T extends Label>(label: T, ...values: number[]): LabeledPoint<T> {
  return { point: Point.of(...values), label };
}

/**
 * Parse one dataset line
 *
 * @throws ParseError on an empty line or an unparsable component or label
 */
export function parseLabeledPoint<T extends Label>(line: string, codec: LabelCodec<T>): LabeledPoint<T> {
  const tokens = line.split(/\s+/).filter(token => token.length > 0);
  const last = tokens.pop();
  if (last === undefined) {
    throw new ParseError('Cannot parse empty line of data');
  }

  const label = codec.parse(last);
  const point = new Point(tokens.map(token => Complex.parse(token)));
  return { point, label };
}

/**
 * Components followed by the label, every field separated by three spaces
 */
export function formatLabeledPoint<T extends Label>(data: LabeledPoint<T>, label: T = data.label): string {
  const fields = data.point.components.map(x => `${x.toString()}   `).join('');
  return `${fields}${String(label)}`;
}
