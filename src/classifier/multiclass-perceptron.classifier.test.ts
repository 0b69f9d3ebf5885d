/**
 * Multiclass perceptron tests
 */

import { describe, it, expect } from 'vitest';
import { MulticlassPerceptronClassifier } from './multiclass-perceptron.classifier';
import { labeled } from '../data/labeled-point';
import { numberLabel } from '../data/label';
import { parseDataset } from '../data/dataset';
import { Point } from '../math/point';
import { silentLogger } from '../utils/logger';

const clusters = [
  labeled('A', 0, 0),
  labeled('A', 1, 0),
  labeled('A', 0, 1),
  labeled('B', 10, 0),
  labeled('B', 11, 0),
  labeled('B', 10, 1),
  labeled('C', 0, 10),
  labeled('C', 1, 10),
  labeled('C', 0, 11),
];

const test = [
  labeled('?', 0.3, 0.3),
  labeled('?', 10.3, 0.3),
  labeled('?', 0.3, 10.3),
];

function createClassifier(seed = 42) {
  return new MulticlassPerceptronClassifier<string>({ defaultLabel: '', logger: silentLogger, seed });
}

describe('MulticlassPerceptronClassifier', () => {
  describe('train()', () => {
    it('should keep one weight vector per label in first-encountered order', () => {
      const model = createClassifier().train(clusters);

      expect([...model.weights.keys()]).toEqual(['A', 'B', 'C']);
      for (const w of model.weights.values()) {
        expect(w.dimension).toBe(3);
      }
    });

    it('should converge on well-separated clusters', () => {
      const model = createClassifier().train(clusters);

      expect(model.converged).toBe(true);
      expect(model.misclassified).toBe(0);
    });

    it('should move the true label towards a missed point and every other label away', () => {
      // constant generator: zero initial weights, visiting order A C B
      const classifier = new MulticlassPerceptronClassifier<string>({
        defaultLabel: '',
        logger: silentLogger,
        rng: () => 0.5,
        learningRate: 0.5,
        maxIterations: 1,
      });

      const model = classifier.train([labeled('A', -2), labeled('B', 0), labeled('C', 2)]);
      const weights = [...model.weights].map(([label, w]) => [label, w.components.map(x => x.re)]);

      // C missed: ±0.5·[1, 2]; then B missed as C: ±0.5·[1, 0]
      expect(weights).toEqual([
        ['A', [-1, -1]],
        ['B', [0, -1]],
        ['C', [0, 1]],
      ]);
      expect(model.misclassified).toBe(2);
      expect(model.converged).toBe(false);
    });

    it('should stop early once misses fall under the threshold', () => {
      const classifier = new MulticlassPerceptronClassifier<string>({
        defaultLabel: '',
        logger: silentLogger,
        rng: () => 0.5,
        learningRate: 0.5,
        threshold: 1,
      });

      const model = classifier.train([labeled('A', -2), labeled('B', 0), labeled('C', 2)]);

      expect(model.iterations).toBe(1);
      expect(model.misclassified).toBe(2);
      expect(model.converged).toBe(true);
    });

    it('should treat NaN labels as one class', () => {
      const training = parseDataset('0 0 nan\n1 1 nan\n', numberLabel);
      const classifier = new MulticlassPerceptronClassifier<number>({
        defaultLabel: 0,
        logger: silentLogger,
        seed: 42,
        maxIterations: 50,
      });

      const model = classifier.train(training);

      expect(model.weights.size).toBe(1);
      expect(model.converged).toBe(true);
      expect(model.misclassified).toBe(0);
      expect(model.iterations).toBe(1);
      expect(Number.isNaN(classifier.predict(model, Point.of(5, 5)))).toBe(true);
    });

    it('should return an empty model without training data', () => {
      const model = createClassifier().train([]);

      expect(model.weights.size).toBe(0);
      expect(model.iterations).toBe(0);
    });
  });

  describe('classify()', () => {
    it('should assign each cluster its label', () => {
      const results = createClassifier().classify(clusters, test);

      expect(results.map(r => r.predicted)).toEqual(['A', 'B', 'C']);
    });

    it('should repeat exactly under a fixed seed', () => {
      const first = createClassifier(42).train(clusters);
      const second = createClassifier(42).train(clusters);

      expect(first.iterations).toBe(second.iterations);
      for (const [label, w] of first.weights) {
        const other = second.weights.get(label);
        expect(other !== undefined && w.equals(other)).toBe(true);
      }

      const classifier = createClassifier(42);
      const again = classifier.classify(clusters, test).map(r => r.predicted);
      expect(classifier.classify(clusters, test).map(r => r.predicted)).toEqual(again);
    });

    it('should return the default label without training data', () => {
      const results = createClassifier().classify([], test);

      expect(results.map(r => r.predicted)).toEqual(['', '', '']);
    });

    it('should label everything with the only class present', () => {
      const classifier = createClassifier();
      const model = classifier.train([labeled('A', 0, 0), labeled('A', 2, 2)]);

      expect(model.converged).toBe(true);
      expect(classifier.predict(model, Point.of(50, -50))).toBe('A');
    });
  });
});
