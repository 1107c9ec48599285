import { describe, it, expect } from 'vitest';
import {
  TangleError,
  TangleErrorCode,
  ConfigError,
  ParseError,
  EmptyInputError,
  isTangleError,
  getErrorMessage,
} from './index.js';

describe('TangleError', () => {
  it('should create error with all properties', () => {
    const error = new TangleError(
      'Test error',
      TangleErrorCode.INVALID_INPUT,
      { field: 'test' },
      'high',
      false,
    );

    expect(error.message).toBe('Test error');
    expect(error.code).toBe(TangleErrorCode.INVALID_INPUT);
    expect(error.context).toEqual({ field: 'test' });
    expect(error.severity).toBe('high');
    expect(error.recoverable).toBe(false);
    expect(error.name).toBe('TangleError');
  });

  it('should create error with defaults', () => {
    const error = new TangleError('Test error', TangleErrorCode.FILE_NOT_FOUND);

    expect(error.context).toBeUndefined();
    expect(error.severity).toBe('medium');
    expect(error.recoverable).toBe(true);
    expect(error.isRecoverable()).toBe(true);
  });

  it('should serialize to JSON correctly', () => {
    const error = new TangleError(
      'Test error',
      TangleErrorCode.FILE_NOT_FOUND,
      { path: '/test/path' },
      'high',
      false,
    );

    expect(error.toJSON()).toEqual({
      error: 'Test error',
      code: 'FILE_NOT_FOUND',
      severity: 'high',
      recoverable: false,
      context: { path: '/test/path' },
    });
  });
});

describe('error subclasses', () => {
  it('should make ConfigError fatal', () => {
    const error = new ConfigError('Invalid threshold', { key: 'cyclomatic' });

    expect(error).toBeInstanceOf(TangleError);
    expect(error.name).toBe('ConfigError');
    expect(error.code).toBe(TangleErrorCode.CONFIG_INVALID);
    expect(error.recoverable).toBe(false);
  });

  it('should carry file and line on ParseError', () => {
    const error = new ParseError('Unexpected syntax at line 3', 'src/a.ts', 3);

    expect(error.name).toBe('ParseError');
    expect(error.code).toBe(TangleErrorCode.PARSE_FAILED);
    expect(error.file).toBe('src/a.ts');
    expect(error.line).toBe(3);
    expect(error.context).toEqual({ file: 'src/a.ts', line: 3 });
    expect(error.recoverable).toBe(true);
  });

  it('should give EmptyInputError its own code', () => {
    const error = new EmptyInputError('No functions found');

    expect(error.code).toBe(TangleErrorCode.NOTHING_TO_ANALYZE);
    expect(error.name).toBe('EmptyInputError');
  });
});

describe('isTangleError', () => {
  it('should recognise subclasses and reject plain errors', () => {
    expect(isTangleError(new ConfigError('x'))).toBe(true);
    expect(isTangleError(new Error('x'))).toBe(false);
    expect(isTangleError('x')).toBe(false);
  });
});

describe('getErrorMessage', () => {
  it('should extract messages from any thrown value', () => {
    expect(getErrorMessage(new Error('Test'))).toBe('Test');
    expect(getErrorMessage('plain')).toBe('plain');
    expect(getErrorMessage(42)).toBe('42');
  });
});
