/**
 * Data exports
 */

export { stringLabel, numberLabel, integerLabel, type LabelCodec } from './label';
export { labeled, parseLabeledPoint, formatLabeledPoint } from './labeled-point';
export { splitLines, parseDataset, formatClassification, formatClassifications } from './dataset';
