/**
 * Base Classifier
 *
 * Abstract base class for classifiers. Holds the fallback label and the
 * logger, and provides the shared arg-max and result helpers.
 *
 * @module classifier
 */

import type { Classification, IClassifier, Label, LabeledPoint } from '../types';
import type { Point } from '../math/point';
import { totalCompare } from '../math/total-order';
import { ClassifierLogger, createLogger } from '../utils/logger';

export interface BaseClassifierOptions<T extends Label> {
  /** Label returned when the classifier cannot determine a winner */
  defaultLabel: T;
  /** Logger (default: console at INFO level) */
  logger?: ClassifierLogger;
}

/**
 * Base class for classifiers
 *
 * **Tie-breaking:** every arg-max (Bayes scores, k-NN votes, perceptron
 * scores) keeps the first candidate that reaches the maximum, in the order
 * the candidates are produced. Scores compare under IEEE-754 totalOrder.
 *
 * @example
 * ```typescript
 * class ConstantClassifier extends BaseClassifier<string> {
 *   name = 'constant';
 *
 *   classify(training, test) {
 *     return test.map((point, index) => this.createResult(point, this.defaultLabel, index));
 *   }
 * }
 * ```
 */
export abstract class BaseClassifier<T extends Label> implements IClassifier<T> {
  /** Classifier name for identification and logging */
  abstract readonly name: string;

  protected readonly defaultLabel: T;
  private readonly rootLogger: ClassifierLogger;

  constructor(options: BaseClassifierOptions<T>) {
    this.defaultLabel = options.defaultLabel;
    this.rootLogger = options.logger ?? createLogger();
  }

  abstract classify(
    training: readonly LabeledPoint<T>[],
    test: readonly LabeledPoint<T>[]
  ): Classification<T>[];

  /**
   * Logger tagged with this classifier's name
   */
  protected get logger(): ClassifierLogger {
    return this.rootLogger.child({ component: this.name });
  }

  /**
   * Helper: wrap a prediction, keeping a reference to the test point
   */
  protected createResult(point: LabeledPoint<T>, predicted: T, index: number): Classification<T> {
    return { point, predicted, index };
  }

  /**
   * Helper: key with the highest score, first one wins on ties
   *
   * @returns undefined when there are no candidates
   */
  protected argMax<K>(candidates: Iterable<readonly [K, number]>): K | undefined {
    let best: { key: K; score: number } | undefined;
    for (const [key, score] of candidates) {
      if (best === undefined || totalCompare(score, best.score) > 0) {
        best = { key, score };
      }
    }
    return best?.key;
  }
}

/**
 * Distinct labels in first-encountered order
 */
export function distinctLabels<T extends Label>(data: readonly LabeledPoint<T>[]): T[] {
  return [...new Set(data.map(d => d.label))];
}

/**
 * Group points by label, groups in first-encountered order
 */
export function groupByLabel<T extends Label>(data: readonly LabeledPoint<T>[]): Map<T, Point[]> {
  const groups = new Map<T, Point[]>();
  for (const d of data) {
    const group = groups.get(d.label);
    if (group) {
      group.push(d.point);
    } else {
      groups.set(d.label, [d.point]);
    }
  }
  return groups;
}

/**
 * Label equality under SameValueZero, matching how `Map` and `Set` group labels
 */
export function sameLabel<T extends Label>(a: T, b: T): boolean {
  return a === b || (a !== a && b !== b);
}
