/**
 * Complex scalar
 *
 * Immutable `re + im·i` pair of doubles. Real data is represented with
 * `im === 0`, so every vector operation works on complex scalars.
 *
 * @module math
 *
 * @example
 * ```typescript
 * const z = Complex.parse('3+4i');
 * z.magnitude();                 // 5
 * z.multiply(z.conjugate()).re;  // 25
 * ```
 */

import { ParseError } from '../utils/errors';

const FLOAT_PATTERN = /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?|inf(?:inity)?|nan)$/i;

/**
 * Parse a decimal float literal, rejecting anything `Number()` would coerce
 * (empty strings, hex, surrounding whitespace)
 */
export function parseFloatStrict(text: string): number {
  if (!FLOAT_PATTERN.test(text)) {
    throw new ParseError(`Invalid float literal: "${text}"`);
  }

  const lower = text.toLowerCase();
  const negative = lower.startsWith('-');
  const unsigned = lower.replace(/^[+-]/, '');
  if (unsigned === 'nan') return NaN;
  if (unsigned.startsWith('inf')) return negative ? -Infinity : Infinity;
  return Number(lower);
}

export class Complex {
  static readonly ZERO = new Complex(0, 0);

  constructor(
    readonly re: number,
    readonly im: number = 0
  ) {}

  static from(re: number): Complex {
    return new Complex(re, 0);
  }

  /**
   * Create from polar coordinates; `theta` in radians
   */
  static fromPolar(r: number, theta: number): Complex {
    return new Complex(r * Math.cos(theta), r * Math.sin(theta));
  }

  /**
   * Parse `"re"` or `"re+imi"`.
   *
   * The text is split on the first `+` and the imaginary part is cut at its
   * first `i`. Without a `+` the imaginary part is zero, so a negative
   * imaginary part must be written as `re+-imi`.
   */
  static parse(text: string): Complex {
    const plus = text.indexOf('+');
    const reText = plus === -1 ? text : text.slice(0, plus);
    const imText = plus === -1 ? '0.0' : text.slice(plus + 1).split('i')[0];

    try {
      return new Complex(parseFloatStrict(reText), parseFloatStrict(imText));
    } catch (error) {
      if (error instanceof ParseError) {
        throw new ParseError(`Invalid complex number: "${text}"`, { details: error.message });
      }
      throw error;
    }
  }

  static sum(values: Iterable<Complex>): Complex {
    let re = 0;
    let im = 0;
    for (const value of values) {
      re += value.re;
      im += value.im;
    }
    return new Complex(re, im);
  }

  get isReal(): boolean {
    return this.im === 0;
  }

  add(other: Complex): Complex {
    return new Complex(this.re + other.re, this.im + other.im);
  }

  subtract(other: Complex): Complex {
    return new Complex(this.re - other.re, this.im - other.im);
  }

  multiply(other: Complex): Complex {
    return new Complex(
      this.re * other.re - this.im * other.im,
      this.re * other.im + this.im * other.re
    );
  }

  /**
   * Multiply by the divisor's conjugate, then scale by its squared magnitude.
   * Dividing by zero yields non-finite components.
   */
  divide(other: Complex): Complex {
    const conj = other.conjugate();
    const numerator = this.multiply(conj);
    const denominator = other.multiply(conj).re;
    return numerator.scale(1 / denominator);
  }

  scale(factor: number): Complex {
    return new Complex(this.re * factor, this.im * factor);
  }

  negate(): Complex {
    return this.scale(-1);
  }

  conjugate(): Complex {
    return new Complex(this.re, -this.im);
  }

  /**
   * `re` itself for real values (no sqrt rounding, keeps the sign), otherwise `hypot(re, im)`
   */
  magnitude(): number {
    if (this.im === 0) {
      return this.re;
    }
    return Math.hypot(this.re, this.im);
  }

  /** Angle in radians */
  angle(): number {
    return Math.atan2(this.im, this.re);
  }

  equals(other: Complex): boolean {
    return this.re === other.re && this.im === other.im;
  }

  toString(): string {
    if (this.im === 0) {
      return `${this.re}`;
    }
    return `${this.re}+${this.im}i`;
  }

  toDebugString(): string {
    if (this.im === 0) {
      return `${this.re}`;
    }
    if (this.im > 0) {
      return `${this.re} + ${this.im}i`;
    }
    return `${this.re} - ${Math.abs(this.im)}i`;
  }
}
