/**
 * Error types and codes for testsmith.
 * Every thrown error extends TestsmithError. Validation findings are values
 * and never travel through this channel.
 */

/**
 * Base error class for all testsmith errors.
 */
export class TestsmithError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TestsmithError';
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
 * Source text that could not be parsed into a syntax tree.
 * No partial extraction result accompanies it.
 */
export class ParseError extends TestsmithError {
  constructor(
    public readonly sourceId: string,
    public readonly line: number,
    public readonly column: number,
    public readonly description: string
  ) {
    super(
      ErrorCodes.PARSE_ERROR,
      `Syntax error in ${sourceId} at line ${line}: ${description}`,
      { sourceId, line, column }
    );
    this.name = 'ParseError';
  }
}

/**
 * A source identifier that could not be opened or read.
 */
export class NotFoundError extends TestsmithError {
  constructor(public readonly sourceId: string, details?: Record<string, unknown>) {
    super(ErrorCodes.NOT_FOUND, `File not found: ${sourceId}`, { sourceId, ...details });
    this.name = 'NotFoundError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends TestsmithError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors: unreadable files, malformed YAML, a failing resolver.
 */
export class SystemError extends TestsmithError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  PARSE_ERROR: 'S001',
  NOT_FOUND: 'S002',
  INVALID_CONFIG: 'S003',
  INVALID_PATTERN: 'S004',
  CONFIG_LOAD_ERROR: 'S005',
  UNKNOWN_TARGET: 'S006',
  RESOLVER_FAILED: 'S007',
  YAML_PARSE_ERROR: 'S008',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
