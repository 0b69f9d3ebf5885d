/**
 * Core types for classification
 */

import type { Point } from '../math/point';

/**
 * Label values a classifier can group, count and compare.
 * Primitive so that `Map` keys and `===` give label equality.
 */
export type Label = string | number | bigint | boolean;

/**
 * A point vector paired with its classification label
 */
export interface LabeledPoint<T extends Label> {
  readonly point: Point;
  readonly label: T;
}

/**
 * Result of classifying one test point.
 *
 * `point` is the test input object itself, not a copy: results are only
 * meaningful while the test dataset they were produced from is.
 */
export interface Classification<T extends Label> {
  /** The classified test point */
  readonly point: LabeledPoint<T>;
  /** The classifier's guess for the point's label */
  readonly predicted: T;
  /** Position of `point` in the test sequence */
  readonly index: number;
}

/**
 * Common classifier contract: train on one set, label every point of another
 */
export interface IClassifier<T extends Label> {
  /** Classifier name */
  readonly name: string;

  /**
   * Classify every test point; output order matches `test`
   */
  classify(
    training: readonly LabeledPoint<T>[],
    test: readonly LabeledPoint<T>[]
  ): Classification<T>[];
}

export * from './validation';
