/**
 * Dataset text helpers
 *
 * Parses whole datasets (one labeled point per line) and renders
 * classification results in the same line layout.
 *
 * @module data
 */

import type { Classification, Label, LabeledPoint } from '../types';
import { ParseError } from '../utils/errors';
import type { LabelCodec } from './label';
import { formatLabeledPoint, parseLabeledPoint } from './labeled-point';

/**
 * Split text into lines, dropping the terminator of the final line
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Parse a dataset, failing on the first bad line
 *
 * @throws ParseError carrying the 1-based `line` number of the offending line
 */
export function parseDataset<T extends Label>(text: string, codec: LabelCodec<T>): LabeledPoint<T>[] {
  return splitLines(text).map((line, i) => {
    try {
      return parseLabeledPoint(line, codec);
    } catch (error) {
      if (error instanceof ParseError) {
        throw new ParseError(`Line ${i + 1}: ${error.message}`, { line: i + 1, details: error.details });
      }
      throw error;
    }
  });
}

/**
 * Render a result as `<components>   <predicted label>`
 */
export function formatClassification<T extends Label>(result: Classification<T>): string {
  return formatLabeledPoint(result.point, result.predicted);
}

/**
 * Render results one per line
 */
export function formatClassifications<T extends Label>(results: readonly Classification<T>[]): string {
  return results.map(formatClassification).join('\n');
}
