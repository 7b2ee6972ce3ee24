/**
 * Tests for error classes and codes.
 */
import { describe, it, expect } from 'vitest';
import {
  DeclargError,
  ConstructionError,
  ConfigError,
  SystemError,
  InputError,
  TypeCoercionError,
  UsageError,
  ActionExit,
  ParseExit,
  ErrorCodes,
} from '../../../src/utils/errors.js';

describe('DeclargError', () => {
  it('should create error with code and message', () => {
    const error = new DeclargError('C001', 'Test error message');

    expect(error.code).toBe('C001');
    expect(error.message).toBe('Test error message');
    expect(error.name).toBe('DeclargError');
  });

  it('should include optional details', () => {
    const error = new DeclargError('C001', 'Test error', { name: 'count' });

    expect(error.details).toEqual({ name: 'count' });
  });

  it('should be instance of Error', () => {
    const error = new DeclargError('C001', 'Test');

    expect(error).toBeInstanceOf(Error);
    expect(error.stack).toBeDefined();
  });

  it('should serialize to JSON', () => {
    const error = new DeclargError('C001', 'Test error', { key: 'value' });

    expect(error.toJSON()).toEqual({
      name: 'DeclargError',
      code: 'C001',
      message: 'Test error',
      details: { key: 'value' },
    });
  });
});

describe('subclasses', () => {
  it('should name construction, config and system errors', () => {
    expect(new ConstructionError(ErrorCodes.DUPLICATE_NAME, 'x').name).toBe('ConstructionError');
    expect(new ConfigError(ErrorCodes.INVALID_CONFIG, 'x').name).toBe('ConfigError');
    expect(new SystemError(ErrorCodes.FILE_NOT_FOUND, 'x').name).toBe('SystemError');
  });

  it('should give input and coercion errors fixed codes', () => {
    expect(new InputError('bad').code).toBe(ErrorCodes.INVALID_INPUT);
    expect(new TypeCoercionError('bad').code).toBe(ErrorCodes.INVALID_VALUE);
  });

  it('should carry exit codes on parse exits', () => {
    const usage = new UsageError('error: missing', 1);
    expect(usage).toBeInstanceOf(ParseExit);
    expect(usage.code).toBe(ErrorCodes.USAGE_ERROR);
    expect(usage.exitCode).toBe(1);

    const exit = new ActionExit('version', 3, 3);
    expect(exit.action).toBe('version');
    expect(exit.result).toBe(3);
    expect(exit.message).toBe("Action 'version' ended parsing");
    expect(exit.details).toEqual({ action: 'version' });
  });
});

describe('ErrorCodes', () => {
  it('should have unique values', () => {
    const values = Object.values(ErrorCodes);
    expect(new Set(values).size).toBe(values.length);
  });
});
