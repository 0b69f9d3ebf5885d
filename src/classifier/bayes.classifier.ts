/**
 * Bayesian Plug-In Classifier
 *
 * Gaussian discriminant with equal, implicit identity covariance. Each
 * label's centroid `μ` is plugged into the linear discriminant
 *
 * `g(x) = w·x − w₀`, with `w = 2·conj(μ)` and `w₀ = μ·conj(μ)`
 *
 * and the label with the largest real score wins. For real data this is
 * nearest-centroid classification, since `‖x − μ‖²` differs from `−g(x)`
 * only by `‖x‖²`, which is the same for every label.
 *
 * @module classifier
 *
 * @example
 * ```typescript
 * const bayes = new BayesPlugInClassifier({ defaultLabel: '' });
 * const results = bayes.classify(training, test);
 * results[0].predicted; // label of the closest centroid
 * ```
 */

import type { Classification, Label, LabeledPoint } from '../types';
import type { Complex } from '../math/complex';
import { Point } from '../math/point';
import { BaseClassifier, groupByLabel, type BaseClassifierOptions } from './base';

/**
 * Plug-in weights for one label
 */
export interface BayesWeights {
  /** w = 2·conj(μ) */
  readonly w: Point;
  /** w₀ = μ·conj(μ) */
  readonly w0: Complex;
  /** Label centroid μ */
  readonly mean: Point;
}

/**
 * Trained model: weights per label, in first-encountered label order
 */
export type BayesModel<T extends Label> = ReadonlyMap<T, BayesWeights>;

export type BayesPlugInClassifierOptions<T extends Label> = BaseClassifierOptions<T>;

export class BayesPlugInClassifier<T extends Label> extends BaseClassifier<T> {
  readonly name = 'bayes';

  constructor(options: BayesPlugInClassifierOptions<T>) {
    super(options);
  }

  /**
   * Compute the plug-in weights of every label in the training set
   */
  train(training: readonly LabeledPoint<T>[]): BayesModel<T> {
    const model = new Map<T, BayesWeights>();

    for (const [label, points] of groupByLabel(training)) {
      const mean = Point.mean(points);
      const meanConj = mean.conjugate();
      model.set(label, {
        w: meanConj.scale(2),
        w0: mean.dot(meanConj),
        mean,
      });
    }

    return model;
  }

  /**
   * Discriminant value of every label for `point`
   */
  scores(model: BayesModel<T>, point: Point): Map<T, number> {
    const scores = new Map<T, number>();
    for (const [label, weights] of model) {
      scores.set(label, weights.w.dot(point).subtract(weights.w0).re);
    }
    return scores;
  }

  /**
   * Label with the highest score; the default label for an empty model
   */
  predict(model: BayesModel<T>, point: Point): T {
    return this.argMax(this.scores(model, point)) ?? this.defaultLabel;
  }

  classify(
    training: readonly LabeledPoint<T>[],
    test: readonly LabeledPoint<T>[]
  ): Classification<T>[] {
    const model = this.train(training);

    this.logger.debug('Trained plug-in weights', {
      trainingSize: training.length,
      testSize: test.length,
      labels: model.size,
    });

    return test.map((data, index) =>
      this.createResult(data, this.predict(model, data.point), index)
    );
  }
}
