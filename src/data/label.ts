/**
 * Label codecs
 *
 * A codec turns the trailing token of a dataset line into a label value and
 * supplies the fallback label used when a classifier cannot pick a winner.
 *
 * @module data
 */

import type { Label } from '../types';
import { parseFloatStrict } from '../math/complex';
import { ParseError } from '../utils/errors';

export interface LabelCodec<T extends Label> {
  /** Parse a label token */
  parse(token: string): T;
  /** Label used when no winner can be determined */
  readonly defaultValue: T;
}

/** Labels kept as raw strings; default `""` */
export const stringLabel: LabelCodec<string> = {
  parse: token => token,
  defaultValue: '',
};

/** Floating-point labels; default `0` */
export const numberLabel: LabelCodec<number> = {
  parse: token => {
    try {
      return parseFloatStrict(token);
    } catch (error) {
      if (error instanceof ParseError) {
        throw new ParseError(`Invalid numeric label: "${token}"`, { details: error.message });
      }
      throw error;
    }
  },
  defaultValue: 0,
};

const INTEGER_PATTERN = /^[+-]?\d+$/;

/** Safe-integer labels; default `0` */
export const integerLabel: LabelCodec<number> = {
  parse: token => {
    const value = Number(token);
    if (!INTEGER_PATTERN.test(token) || !Number.isSafeInteger(value)) {
      throw new ParseError(`Invalid integer label: "${token}"`);
    }
    return value;
  },
  defaultValue: 0,
};
