/**
 * Multiclass Single-Layer Perceptron (one-vs-rest)
 *
 * One weight vector per label, scored independently; the arg-max label
 * wins. On a miss the true label's weights move towards the point and
 * every other label's weights move away from it by the same step.
 *
 * Points are centroid-translated and bias-augmented exactly like the
 * binary perceptron, with the same shuffled passes, threshold and cap.
 * Labels (and so arg-max ties) follow first-encountered training order.
 *
 * @module classifier
 *
 * @example
 * ```typescript
 * const slp = new MulticlassPerceptronClassifier({ defaultLabel: '', seed: 42 });
 * const results = slp.classify(training, test);
 * ```
 */

import type { Classification, Label, LabeledPoint } from '../types';
import { Point } from '../math/point';
import { randomWeights } from '../random/rng';
import { distinctLabels, sameLabel } from './base';
import {
  BasePerceptronClassifier,
  augment,
  trainingCentroid,
  type PerceptronClassifierOptions,
  type TrainingStats,
} from './perceptron.base';

/**
 * Trained multiclass perceptron
 */
export interface MulticlassPerceptronModel<T extends Label> extends TrainingStats {
  /** Augmented weights per label, in first-encountered label order */
  readonly weights: ReadonlyMap<T, Point>;
  /** Training centroid subtracted from every point */
  readonly centroid: Point;
}

export class MulticlassPerceptronClassifier<T extends Label> extends BasePerceptronClassifier<T> {
  readonly name = 'multiclass-perceptron';

  constructor(options: PerceptronClassifierOptions<T>) {
    super(options);
  }

  /**
   * Train on `training`. An empty set gives an empty model, which labels
   * everything with the default label.
   */
  train(training: readonly LabeledPoint<T>[]): MulticlassPerceptronModel<T> {
    if (training.length === 0) {
      this.logger.debug('No training data, every point gets the default label');
      return { weights: new Map<T, Point>(), centroid: Point.ZERO, iterations: 0, misclassified: 0, converged: true };
    }

    const rng = this.nextRng();
    const dimension = training[0].point.dimension + 1;
    const weights = new Map<T, Point>();
    for (const label of distinctLabels(training)) {
      weights.set(label, randomWeights(dimension, rng));
    }

    const centroid = trainingCentroid(training);
    const { learningRate } = this.options;

    const samples = training.map(d => ({
      point: augment(d.point, centroid),
      label: d.label,
    }));

    const stats = this.runPasses(samples, rng, sample => {
      const guess = this.argMax(this.scores(weights, sample.point));
      if (guess !== undefined && sameLabel(guess, sample.label)) {
        return true;
      }

      const adjustment = sample.point.scale(learningRate);
      for (const [label, w] of weights) {
        weights.set(label, sameLabel(label, sample.label) ? w.add(adjustment) : w.subtract(adjustment));
      }
      return false;
    });

    return { ...stats, weights, centroid };
  }

  /**
   * Label a point with a trained model
   */
  predict(model: MulticlassPerceptronModel<T>, point: Point): T {
    const augmented = augment(point, model.centroid);
    return this.argMax(this.scores(model.weights, augmented)) ?? this.defaultLabel;
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

  private scores(weights: ReadonlyMap<T, Point>, augmented: Point): Array<[T, number]> {
    return [...weights].map(([label, w]): [T, number] => [label, w.dot(augmented).re]);
  }
}
