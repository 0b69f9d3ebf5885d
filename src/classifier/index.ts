/**
 * Classifier exports
 */

// Base
export { BaseClassifier, distinctLabels, groupByLabel, sameLabel, type BaseClassifierOptions } from './base';
export {
  BasePerceptronClassifier,
  augment,
  trainingCentroid,
  type PerceptronClassifierOptions,
  type TrainingStats,
} from './perceptron.base';

// Classifiers
export {
  BayesPlugInClassifier,
  type BayesPlugInClassifierOptions,
  type BayesModel,
  type BayesWeights,
} from './bayes.classifier';
export { KNearestNeighborClassifier, type KNearestNeighborOptions, type Neighbor } from './knn.classifier';
export { PerceptronClassifier, type BinaryPerceptronModel } from './perceptron.classifier';
export { MulticlassPerceptronClassifier, type MulticlassPerceptronModel } from './multiclass-perceptron.classifier';
