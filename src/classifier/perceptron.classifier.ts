/**
 * Binary Single-Layer Perceptron
 *
 * Linear two-class classifier trained by the perceptron rule. The label of
 * the first training point is the positive class; the first different
 * label is the negative class, and any further labels are folded into the
 * negative class.
 *
 * **Training:**
 * 1. Translate points by the training centroid and prepend `1` (bias)
 * 2. Draw initial weights uniformly from `[-1, 1)`
 * 3. Each pass: shuffle, and for every point compute
 *    `error = target − sign(w·y)` (`target` is `+1` / `−1`);
 *    on a miss add `learningRate × error × y` to `w`
 * 4. Stop when the pass misclassifies nothing, or less than
 *    `threshold × n` points, or after `maxIterations` passes
 *
 * **Inference:** `w·y > 0` → positive label, otherwise negative label
 *
 * @module classifier
 *
 * @example
 * ```typescript
 * const slp = new PerceptronClassifier({ defaultLabel: '', learningRate: 1, seed: 7 });
 * const model = slp.train(training);
 * model.converged; // true for linearly separable data
 * slp.predict(model, Point.of(0.5, 0.5));
 * ```
 */

import type { Classification, Label, LabeledPoint } from '../types';
import type { Point } from '../math/point';
import { randomWeights } from '../random/rng';
import { PreconditionError } from '../utils/errors';
import { sameLabel } from './base';
import {
  BasePerceptronClassifier,
  augment,
  trainingCentroid,
  type PerceptronClassifierOptions,
  type TrainingStats,
} from './perceptron.base';

/**
 * Trained binary perceptron
 */
export interface BinaryPerceptronModel<T extends Label> extends TrainingStats {
  /** Augmented weights `[w₀, w₁, …]` */
  readonly weights: Point;
  /** Training centroid subtracted from every point */
  readonly centroid: Point;
  /** Label for `w·y > 0` */
  readonly positive: T;
  /** Label for `w·y ≤ 0` */
  readonly negative: T;
}

/**
 * Sign of `x`, with +0 counted as positive
 */
function signum(x: number): number {
  if (Number.isNaN(x)) return NaN;
  return x > 0 || Object.is(x, 0) ? 1 : -1;
}

export class PerceptronClassifier<T extends Label> extends BasePerceptronClassifier<T> {
  readonly name = 'perceptron';

  constructor(options: PerceptronClassifierOptions<T>) {
    super(options);
  }

  /**
   * Train on `training`
   *
   * @throws PreconditionError if the set is empty or holds a single label
   */
  train(training: readonly LabeledPoint<T>[]): BinaryPerceptronModel<T> {
    if (training.length === 0) {
      throw new PreconditionError('The data provided to the perceptron is empty');
    }

    const positive = training[0].label;
    const other = training.find(d => !sameLabel(d.label, positive));
    if (other === undefined) {
      throw new PreconditionError(
        'The data provided to the perceptron does not have two classifications',
        { label: String(positive) }
      );
    }
    const negative = other.label;

    const rng = this.nextRng();
    let weights = randomWeights(training[0].point.dimension + 1, rng);
    const centroid = trainingCentroid(training);
    const { learningRate } = this.options;

    const samples = training.map(d => ({
      point: augment(d.point, centroid),
      target: sameLabel(d.label, positive) ? 1 : -1,
    }));

    const stats = this.runPasses(samples, rng, sample => {
      const error = sample.target - signum(weights.dot(sample.point).re);
      if (error === 0) {
        return true;
      }
      weights = weights.add(sample.point.scale(error).scale(learningRate));
      return false;
    });

    return { ...stats, weights, centroid, positive, negative };
  }

  /**
   * Label a point with a trained model
   */
  predict(model: BinaryPerceptronModel<T>, point: Point): T {
    const value = model.weights.dot(augment(point, model.centroid)).re;
    return value > 0 ? model.positive : model.negative;
  }

  classify(
    training: readonly LabeledPoint<T>[],
    test: readonly LabeledPoint<T>[]
  ): Classification<T>[] {
    const model = this.train(training);

    return test.map((data, index) =>
      this.createResult(data, this.predict(model, data.point), index)
    );
  }
}
