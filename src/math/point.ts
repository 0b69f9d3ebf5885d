/**
 * Point vector
 *
 * Variable-length vector of complex scalars. Dimensions are allowed to
 * differ between operands: binary operations treat the shorter vector as
 * zero-padded on its higher dimensions, so the result has the dimension of
 * the longer operand.
 *
 * **Padding rules:**
 * - `add`: the longer operand's tail is carried over unchanged
 * - `subtract`: the tail is carried over, negated when it comes from the right operand
 * - `dot`: only the overlapping prefix contributes
 *
 * @module math
 *
 * @example
 * ```typescript
 * const a = Point.of(1, 2);
 * const b = Point.of(3, 4, 5);
 *
 * a.add(b);       // Point [4, 6, 5]
 * b.subtract(a);  // Point [2, 2, 5]
 * a.dot(b).re;    // 11
 * ```
 */

import { Complex } from './complex';

export class Point {
  static readonly ZERO = new Point([]);

  readonly components: readonly Complex[];

  constructor(components: readonly Complex[]) {
    this.components = components;
  }

  /**
   * Create a real-valued point
   */
  static of(...values: number[]): Point {
    return new Point(values.map(Complex.from));
  }

  static fromComplex(values: readonly Complex[]): Point {
    return new Point([...values]);
  }

  /**
   * Sum of all points, starting from the zero-dimensional point
   */
  static sum(points: Iterable<Point>): Point {
    let total = Point.ZERO;
    for (const point of points) {
      total = total.add(point);
    }
    return total;
  }

  /**
   * Centroid of a non-empty group of points
   */
  static mean(points: readonly Point[]): Point {
    return Point.sum(points).scale(1 / points.length);
  }

  get dimension(): number {
    return this.components.length;
  }

  /**
   * Component at `index`, zero past the end
   */
  get(index: number): Complex {
    return this.components[index] ?? Complex.ZERO;
  }

  add(other: Point): Point {
    const [longer, shorter] = this.dimension >= other.dimension ? [this, other] : [other, this];
    const result = longer.components.map((x, i) =>
      i < shorter.dimension ? x.add(shorter.components[i]) : x
    );
    return new Point(result);
  }

  subtract(other: Point): Point {
    const dimension = Math.max(this.dimension, other.dimension);
    const result: Complex[] = new Array(dimension);
    for (let i = 0; i < dimension; i++) {
      if (i >= other.dimension) {
        result[i] = this.components[i];
      } else if (i >= this.dimension) {
        result[i] = other.components[i].negate();
      } else {
        result[i] = this.components[i].subtract(other.components[i]);
      }
    }
    return new Point(result);
  }

  scale(factor: number): Point {
    return new Point(this.components.map(x => x.scale(factor)));
  }

  negate(): Point {
    return this.scale(-1);
  }

  conjugate(): Point {
    return new Point(this.components.map(x => x.conjugate()));
  }

  /**
   * Unconjugated dot product over the overlapping prefix
   */
  dot(other: Point): Complex {
    const n = Math.min(this.dimension, other.dimension);
    let total = Complex.ZERO;
    for (let i = 0; i < n; i++) {
      total = total.add(this.components[i].multiply(other.components[i]));
    }
    return total;
  }

  /**
   * Euclidean norm: `sqrt(Σ x·conj(x))`
   */
  magnitude(): number {
    const squares = this.components.map(x => x.multiply(x.conjugate()));
    return Math.sqrt(Complex.sum(squares).magnitude());
  }

  /**
   * New point with `value` as the first component (bias augmentation)
   */
  prepend(value: Complex | number): Point {
    const head = typeof value === 'number' ? Complex.from(value) : value;
    return new Point([head, ...this.components]);
  }

  equals(other: Point): boolean {
    return (
      this.dimension === other.dimension &&
      this.components.every((x, i) => x.equals(other.components[i]))
    );
  }

  toArray(): Complex[] {
    return [...this.components];
  }

  /**
   * Components separated by three spaces
   */
  toString(): string {
    return this.components.map(x => x.toString()).join('   ');
  }
}
