/**
 * Error types and codes for declarg.
 * Every error the library raises on purpose extends DeclargError.
 */

/**
 * Base error class for all declarg errors.
 */
export class DeclargError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DeclargError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Ill-formed declarative tree. Raised while building or compiling a parser,
 * never while parsing user input.
 */
export class ConstructionError extends DeclargError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConstructionError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends DeclargError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends DeclargError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Thrown from a produce hook to report bad user input at the hook's level.
 * The engine turns it into a usage error of the owning parser.
 */
export class InputError extends DeclargError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.INVALID_INPUT, message, details);
    this.name = 'InputError';
  }
}

/**
 * A raw token could not be turned into a value. Raised by type rules; the
 * compiler hands it to commander, which reports it as invalid input.
 */
export class TypeCoercionError extends DeclargError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.INVALID_VALUE, message, details);
    this.name = 'TypeCoercionError';
  }
}

/**
 * Raised by `parseArgs` in place of a process exit when `exit_on_error` is off.
 */
export class ParseExit extends DeclargError {
  constructor(
    code: string,
    message: string,
    public readonly exitCode: number,
    details?: Record<string, unknown>
  ) {
    super(code, message, details);
    this.name = 'ParseExit';
  }
}

/**
 * Malformed command line: the message has already been written to stderr.
 */
export class UsageError extends ParseExit {
  constructor(message: string, exitCode: number, details?: Record<string, unknown>) {
    super(ErrorCodes.USAGE_ERROR, message, exitCode, details);
    this.name = 'UsageError';
  }
}

/**
 * A terminal action (or help) ran and asked the parse to stop.
 */
export class ActionExit extends ParseExit {
  constructor(
    public readonly action: string,
    public readonly result: unknown,
    exitCode: number
  ) {
    super(ErrorCodes.ACTION_TAKEN, `Action '${action}' ended parsing`, exitCode, { action });
    this.name = 'ActionExit';
  }
}

export const ErrorCodes = {
  // Construction errors (C001-C010)
  DUPLICATE_NAME: 'C001',
  DUPLICATE_KEYWORD: 'C002',
  RESERVED_NAME: 'C003',
  UNKNOWN_AS_MANY_AS: 'C004',
  CYCLIC_AS_MANY_AS: 'C005',
  VARIADIC_NOT_LAST: 'C006',
  INVALID_ARGUMENT: 'C007',
  CYCLIC_TREE: 'C008',
  UNTYPED_KEYWORD_PARAMETER: 'C009',
  UNKNOWN_DIALECT: 'C010',

  // Introspection errors (D001-D003)
  INVALID_TARGET: 'D001',
  EXPORT_NOT_FOUND: 'D002',
  UNSUPPORTED_DECLARATION: 'D003',

  // Parse outcomes (P001-P003)
  USAGE_ERROR: 'P001',
  ACTION_TAKEN: 'P002',
  INVALID_INPUT: 'P003',
  INVALID_VALUE: 'P004',

  // System errors (S001-S003)
  FILE_NOT_FOUND: 'S001',
  PARSE_ERROR: 'S002',
  INVALID_CONFIG: 'S003',

  // Config errors
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
