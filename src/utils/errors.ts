/**
 * Error types and codes for guidesmith.
 * Every error the CLI reports extends GuidesmithError.
 */

/**
 * Base error class for all guidesmith errors.
 */
export class GuidesmithError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GuidesmithError';
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
 * Bad or missing command-line arguments. Carries the usage text to print.
 */
export class UsageError extends GuidesmithError {
  constructor(
    message: string,
    public readonly usage?: string,
    code: ErrorCode = ErrorCodes.USAGE
  ) {
    super(code, message, usage ? { usage } : undefined);
    this.name = 'UsageError';
  }
}

/**
 * A category string outside the fixed enumeration.
 */
export class InvalidCategoryError extends GuidesmithError {
  constructor(
    public readonly value: string,
    public readonly allowed: readonly string[]
  ) {
    super(
      ErrorCodes.INVALID_CATEGORY,
      `TYPE must be ${allowed.map((c) => `'${c}'`).join(' or ')}`,
      { value, allowed: [...allowed] }
    );
    this.name = 'InvalidCategoryError';
  }
}

/**
 * Refusal to overwrite an existing guide.
 */
export class AlreadyExistsError extends GuidesmithError {
  constructor(public readonly path: string) {
    super(ErrorCodes.ALREADY_EXISTS, `${path} already exists`, { path });
    this.name = 'AlreadyExistsError';
  }
}

/**
 * An external formatter or linter failed to start or exited non-zero.
 * The tool's own output is kept verbatim in `output`.
 */
export class ExternalToolFailure extends GuidesmithError {
  constructor(
    public readonly tool: string,
    public readonly exitCode: number,
    public readonly output: string,
    code: ErrorCode = ErrorCodes.EXTERNAL_TOOL
  ) {
    super(code, `${tool} exited with code ${exitCode}`, { tool, exitCode });
    this.name = 'ExternalToolFailure';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends GuidesmithError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (write failures, missing git repository, parse errors).
 */
export class SystemError extends GuidesmithError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Scaffolder (G001-G004)
  USAGE: 'G001',
  INVALID_CATEGORY: 'G002',
  ALREADY_EXISTS: 'G003',
  INVALID_NAME: 'G004',

  // Pipeline (P001-P002)
  EXTERNAL_TOOL: 'P001',
  TOOL_NOT_FOUND: 'P002',

  // Configuration (C001-C002)
  CONFIG_LOAD: 'C001',
  CONFIG_INVALID: 'C002',

  // System (S001-S003)
  PARSE_ERROR: 'S001',
  WRITE_FAILED: 'S002',
  NOT_A_GIT_REPO: 'S003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
