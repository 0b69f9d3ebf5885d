/**
 * Zod validation schemas for classifier options
 */

import { z } from 'zod';
import { ConfigError } from '../utils/errors';

/** Hard cap on perceptron training passes */
export const DEFAULT_MAX_ITERATIONS = 10_000;

/**
 * k-nearest-neighbor options schema
 */
export const knnOptionsSchema = z.object({
  k: z.number().int().nonnegative().describe('Number of neighbors that vote'),
});

/**
 * Perceptron options schema (binary and multiclass)
 */
export const perceptronOptionsSchema = z.object({
  learningRate: z.number().positive().finite().optional().default(1.0)
    .describe('Step size applied to every weight update'),
  threshold: z.number().min(0).max(1).optional().default(0.0)
    .describe('Misclassified fraction under which training stops early'),
  maxIterations: z.number().int().positive().optional().default(DEFAULT_MAX_ITERATIONS)
    .describe('Maximum number of training passes'),
  seed: z.number().int().optional()
    .describe('Seed for weight initialization and shuffling'),
});

export type KnnOptions = z.output<typeof knnOptionsSchema>;
export type PerceptronOptionsInput = z.input<typeof perceptronOptionsSchema>;
export type PerceptronOptions = z.output<typeof perceptronOptionsSchema>;

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: string[] };

function validateWith<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown
): ValidationResult<z.output<S>> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    errors: result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
  };
}

/**
 * Validate k-NN options
 */
export function validateKnnOptions(input: unknown): ValidationResult<KnnOptions> {
  return validateWith(knnOptionsSchema, input);
}

/**
 * Validate perceptron options
 */
export function validatePerceptronOptions(input: unknown): ValidationResult<PerceptronOptions> {
  return validateWith(perceptronOptionsSchema, input);
}

/**
 * Validate and return k-NN options, throwing `ConfigError` when invalid
 */
export function validateAndNormalizeKnnOptions(input: unknown): KnnOptions {
  const result = validateKnnOptions(input);

  if (!result.success) {
    throw new ConfigError(`Invalid k-NN options:\n${result.errors.join('\n')}`, result.errors);
  }

  return result.data;
}

/**
 * Validate and return perceptron options with defaults applied
 */
export function validateAndNormalizePerceptronOptions(input: unknown): PerceptronOptions {
  const result = validatePerceptronOptions(input);

  if (!result.success) {
    throw new ConfigError(`Invalid perceptron options:\n${result.errors.join('\n')}`, result.errors);
  }

  return result.data;
}
