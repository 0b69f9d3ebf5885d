/**
 * k-Nearest Neighbor Classifier
 *
 * Majority vote among the `k` training points closest (Euclidean distance)
 * to each test point. There is no training phase: every test point is
 * measured against the whole training set, then a partial sort brings the
 * `k` closest to the front.
 *
 * **Complexity per test point:** `O(n)` distances + `O(k·n)` selection
 *
 * **Ties:**
 * - equal distances keep the order the selection produces (totalOrder on distance)
 * - equal vote counts go to the label reached first while tallying, and
 *   neighbors are tallied nearest first
 *
 * @module classifier
 *
 * @example
 * ```typescript
 * const knn = new KNearestNeighborClassifier({ k: 3, defaultLabel: '' });
 * const results = knn.classify(training, test);
 * ```
 */

import type { Classification, Label, LabeledPoint } from '../types';
import type { Point } from '../math/point';
import { totalCompare } from '../math/total-order';
import { partialSort } from '../sort/partial-sort';
import { validateAndNormalizeKnnOptions } from '../types/validation';
import { PreconditionError } from '../utils/errors';
import { BaseClassifier, type BaseClassifierOptions } from './base';

export interface KNearestNeighborOptions<T extends Label> extends BaseClassifierOptions<T> {
  /** Number of neighbors that vote (non-negative integer) */
  k: number;
}

/**
 * A training point and its distance from the query
 */
export interface Neighbor<T extends Label> {
  readonly data: LabeledPoint<T>;
  readonly distance: number;
}

export class KNearestNeighborClassifier<T extends Label> extends BaseClassifier<T> {
  readonly name = 'knn';
  readonly k: number;

  constructor(options: KNearestNeighborOptions<T>) {
    super(options);
    this.k = validateAndNormalizeKnnOptions({ k: options.k }).k;
  }

  /**
   * The `k` training points closest to `point`, nearest first
   *
   * @throws PreconditionError if the training set has fewer than `k` points
   */
  nearest(training: readonly LabeledPoint<T>[], point: Point): Neighbor<T>[] {
    this.assertEnoughNeighbors(training);

    const distances: Neighbor<T>[] = training.map(data => ({
      data,
      distance: data.point.subtract(point).magnitude(),
    }));

    partialSort(distances, this.k, (a, b) => totalCompare(a.distance, b.distance));
    return distances.slice(0, this.k);
  }

  /**
   * Majority label among `neighbors`; the default label when there are none
   */
  vote(neighbors: readonly Neighbor<T>[]): T {
    const votes = new Map<T, number>();
    for (const { data } of neighbors) {
      votes.set(data.label, (votes.get(data.label) ?? 0) + 1);
    }
    return this.argMax(votes) ?? this.defaultLabel;
  }

  classify(
    training: readonly LabeledPoint<T>[],
    test: readonly LabeledPoint<T>[]
  ): Classification<T>[] {
    this.assertEnoughNeighbors(training);

    this.logger.debug('Classifying by nearest neighbors', {
      trainingSize: training.length,
      testSize: test.length,
      k: this.k,
    });

    return test.map((data, index) =>
      this.createResult(data, this.vote(this.nearest(training, data.point)), index)
    );
  }

  private assertEnoughNeighbors(training: readonly LabeledPoint<T>[]): void {
    if (training.length < this.k) {
      throw new PreconditionError(
        `Not enough training data for ${this.k} neighbors`,
        { trainingSize: training.length, k: this.k }
      );
    }
  }
}
