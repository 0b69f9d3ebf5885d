import { describe, it, expect } from 'vitest';
import { ClassifyError, ConfigError, ParseError, PreconditionError, ErrorCodes } from './errors';

describe('errors', () => {
  it('should keep the class hierarchy', () => {
    const parse = new ParseError('bad', { line: 4 });
    const precondition = new PreconditionError('no');
    const config = new ConfigError('invalid', ['k: too small']);

    expect(parse).toBeInstanceOf(ClassifyError);
    expect(parse).toBeInstanceOf(Error);
    expect(precondition).toBeInstanceOf(ClassifyError);
    expect(precondition).not.toBeInstanceOf(ParseError);
    expect(config.errors).toEqual(['k: too small']);
  });

  it('should carry codes and names', () => {
    expect(new ParseError('bad').code).toBe(ErrorCodes.PARSE_ERROR);
    expect(new ParseError('bad', { line: 4 }).line).toBe(4);
    expect(new PreconditionError('no').code).toBe('PRECONDITION_FAILED');
    expect(new PreconditionError('no').name).toBe('PreconditionError');
    expect(new ConfigError('x', []).code).toBe('INVALID_CONFIG');
  });
});
