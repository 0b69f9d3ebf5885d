/**
 * Vector Classifiers
 * Supervised classification of labeled points in n-dimensional
 * (optionally complex-valued) vector spaces
 *
 * @packageDocumentation
 */

// Export types
export * from './types';

// Export vector and scalar algebra
export * from './math';

// Export labeled point parsing and formatting
export * from './data';

// Export selection and randomness primitives
export * from './sort';
export * from './random';

// Export classifiers
export * from './classifier';

// Export utilities
export { ClassifierLogger, LogLevel, createLogger, silentLogger } from './utils/logger';
export type { LogContext, LogLevelName, LogSink } from './utils/logger';
export {
  ClassifyError,
  ParseError,
  PreconditionError,
  ConfigError,
  ErrorCodes,
  type ErrorCode,
} from './utils/errors';
