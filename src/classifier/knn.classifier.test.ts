/**
 * k-nearest-neighbor classifier tests
 */

import { describe, it, expect } from 'vitest';
import { KNearestNeighborClassifier } from './knn.classifier';
import { labeled } from '../data/labeled-point';
import { parseDataset, formatClassifications } from '../data/dataset';
import { stringLabel } from '../data/label';
import { Point } from '../math/point';
import { ConfigError, PreconditionError } from '../utils/errors';
import { silentLogger } from '../utils/logger';

function createClassifier(k: number) {
  return new KNearestNeighborClassifier<string>({ k, defaultLabel: '', logger: silentLogger });
}

describe('KNearestNeighborClassifier', () => {
  describe('Constructor', () => {
    it('should validate k', () => {
      expect(() => createClassifier(-1)).toThrow(ConfigError);
      expect(() => createClassifier(1.5)).toThrow(ConfigError);
      expect(createClassifier(3).k).toBe(3);
    });
  });

  describe('nearest()', () => {
    it('should return the k closest points, nearest first', () => {
      const training = [
        labeled('A', 5, 0),
        labeled('B', 1, 0),
        labeled('C', 3, 0),
        labeled('D', 2, 0),
      ];

      const neighbors = createClassifier(2).nearest(training, Point.of(0, 0));

      expect(neighbors.map(n => n.data.label)).toEqual(['B', 'D']);
      expect(neighbors.map(n => n.distance)).toEqual([1, 2]);
    });

    it('should measure across mismatched dimensions', () => {
      const neighbors = createClassifier(1).nearest([labeled('A', 3, 4, 12)], Point.of(0, 0));

      expect(neighbors[0].distance).toBe(13);
    });

    it('should order NaN distances last', () => {
      const training = [labeled('A', NaN, 0), labeled('B', 5, 5)];

      expect(createClassifier(1).nearest(training, Point.of(0, 0))[0].data.label).toBe('B');
    });
  });

  describe('classify()', () => {
    it('should classify the nearest training point (end to end)', () => {
      const training = parseDataset('0 0 A\n10 10 B\n', stringLabel);
      const test = parseDataset('1 1 ?\n', stringLabel);

      const results = createClassifier(1).classify(training, test);

      expect(results[0].predicted).toBe('A');
      expect(formatClassifications(results)).toBe('1   1   A');
    });

    it('should return the label of an exact duplicate for k = 1', () => {
      const training = [labeled('A', 0, 0), labeled('B', 2, 3), labeled('C', 4, 4)];
      const results = createClassifier(1).classify(training, [labeled('?', 2, 3)]);

      expect(results[0].predicted).toBe('B');
    });

    it('should take the majority vote', () => {
      const training = [
        labeled('A', 0, 0),
        labeled('A', 0, 1),
        labeled('B', 1, 0),
        labeled('B', 9, 9),
      ];
      const results = createClassifier(3).classify(training, [labeled('?', 0.9, 0.1)]);

      // neighbors: B (1,0), A (0,0), A (0,1)
      expect(results[0].predicted).toBe('A');
    });

    it('should break vote ties by the nearest label', () => {
      const training = [labeled('A', 0, 0), labeled('B', 3, 0)];
      const classifier = createClassifier(2);

      expect(classifier.classify(training, [labeled('?', 1, 0)])[0].predicted).toBe('A');
      expect(classifier.classify(training, [labeled('?', 2, 0)])[0].predicted).toBe('B');
    });

    it('should return the default label for k = 0', () => {
      const results = createClassifier(0).classify([labeled('A', 0, 0)], [labeled('?', 0, 0)]);

      expect(results[0].predicted).toBe('');
    });

    it('should fail when k exceeds the training set', () => {
      const classifier = createClassifier(3);

      expect(() => classifier.classify([labeled('A', 0, 0)], [])).toThrow(PreconditionError);
      expect(() => classifier.classify([labeled('A', 0, 0)], [])).toThrow('Not enough training data for 3 neighbors');
    });

    it('should not reorder the training set', () => {
      const training = [labeled('A', 5, 0), labeled('B', 1, 0)];
      createClassifier(2).classify(training, [labeled('?', 0, 0)]);

      expect(training.map(d => d.label)).toEqual(['A', 'B']);
    });
  });
});
