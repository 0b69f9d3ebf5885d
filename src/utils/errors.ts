/**
 * Error types for classification
 *
 * - `ParseError` is recoverable: bad input text, surfaced to the caller
 * - `PreconditionError` is fatal: the algorithm cannot run on the given data
 * - `ConfigError` is raised when classifier options fail validation
 */

export const ErrorCodes = {
  PARSE_ERROR: 'PARSE_ERROR',
  PRECONDITION_FAILED: 'PRECONDITION_FAILED',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export class ClassifyError extends Error {
  public code: ErrorCode;
  public details?: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'ClassifyError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, ClassifyError.prototype);
  }
}

export class ParseError extends ClassifyError {
  /** 1-based line number, when parsing a whole dataset */
  public line?: number;

  constructor(message: string, options: { line?: number; details?: unknown } = {}) {
    super(ErrorCodes.PARSE_ERROR, message, options.details);
    this.name = 'ParseError';
    this.line = options.line;
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}

export class PreconditionError extends ClassifyError {
  constructor(message: string, details?: unknown) {
    super(ErrorCodes.PRECONDITION_FAILED, message, details);
    this.name = 'PreconditionError';
    Object.setPrototypeOf(this, PreconditionError.prototype);
  }
}

export class ConfigError extends ClassifyError {
  public errors: string[];

  constructor(message: string, errors: string[]) {
    super(ErrorCodes.INVALID_CONFIG, message, errors);
    this.name = 'ConfigError';
    this.errors = errors;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
