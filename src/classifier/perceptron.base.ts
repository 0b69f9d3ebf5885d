/**
 * Shared machinery for the single-layer perceptrons
 *
 * Both perceptrons translate points by the training centroid, prepend a
 * constant `1` so the bias folds into the weights, and run shuffled
 * training passes until the misclassified fraction drops under the
 * threshold or the pass cap is reached.
 *
 * @module classifier
 */

import type { Label, LabeledPoint } from '../types';
import { Point } from '../math/point';
import { createRng, shuffle, type Rng } from '../random/rng';
import {
  validateAndNormalizePerceptronOptions,
  type PerceptronOptions,
  type PerceptronOptionsInput,
} from '../types/validation';
import { BaseClassifier, type BaseClassifierOptions } from './base';

export interface PerceptronClassifierOptions<T extends Label>
  extends BaseClassifierOptions<T>, PerceptronOptionsInput {
  /**
   * Generator for weight initialization and shuffling. Takes precedence
   * over `seed`; shared across `train()` calls.
   */
  rng?: Rng;
}

/**
 * Outcome of a training run
 */
export interface TrainingStats {
  /** Passes performed */
  readonly iterations: number;
  /** Misclassified points in the last pass */
  readonly misclassified: number;
  /** Whether training stopped on the threshold rather than the pass cap */
  readonly converged: boolean;
}

/**
 * Translate by the centroid and prepend the bias term: `[1, x − μ]`
 */
export function augment(point: Point, centroid: Point): Point {
  return point.subtract(centroid).prepend(1);
}

/**
 * Centroid of all training points
 */
export function trainingCentroid<T extends Label>(training: readonly LabeledPoint<T>[]): Point {
  return Point.mean(training.map(d => d.point));
}

export abstract class BasePerceptronClassifier<T extends Label> extends BaseClassifier<T> {
  readonly options: PerceptronOptions;
  private readonly injectedRng?: Rng;

  constructor(options: PerceptronClassifierOptions<T>) {
    super(options);
    const { learningRate, threshold, maxIterations, seed } = options;
    this.options = validateAndNormalizePerceptronOptions({ learningRate, threshold, maxIterations, seed });
    this.injectedRng = options.rng;
  }

  /**
   * Generator for one training run: the injected one, else a fresh
   * generator from `seed` (so runs with a seed repeat exactly), else a
   * time-seeded one
   */
  protected nextRng(): Rng {
    return this.injectedRng ?? createRng(this.options.seed);
  }

  /**
   * Stop once a pass misclassifies nothing or less than `threshold` of the set
   */
  protected isTrained(misclassified: number, size: number): boolean {
    return misclassified === 0 || misclassified < this.options.threshold * size;
  }

  /**
   * Run shuffled passes over `samples`; `step` updates the weights for one
   * sample and returns false when it was misclassified
   */
  protected runPasses<S>(samples: S[], rng: Rng, step: (sample: S) => boolean): TrainingStats {
    let misclassified = 0;

    for (let iteration = 1; iteration <= this.options.maxIterations; iteration++) {
      shuffle(samples, rng);

      misclassified = 0;
      for (const sample of samples) {
        if (!step(sample)) {
          misclassified++;
        }
      }

      if (this.isTrained(misclassified, samples.length)) {
        this.logger.debug('Training converged', {
          iterations: iteration,
          misclassified,
          trainingSize: samples.length,
        });
        return { iterations: iteration, misclassified, converged: true };
      }
    }

    this.logger.warn('Training stopped at the iteration cap', {
      iterations: this.options.maxIterations,
      misclassified,
      threshold: this.options.threshold,
      trainingSize: samples.length,
    });
    return { iterations: this.options.maxIterations, misclassified, converged: false };
  }
}
