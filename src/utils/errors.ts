/**
 * Error types and codes for pgmutate.
 * This is the error contract - all errors should extend PgMutateError.
 */

/**
 * Where in an entity file a compile-time problem was found.
 */
export interface CompileLocation {
  action?: string;
  entity?: string;
  /** 1-based index of the step in the action's YAML */
  stepIndex?: number;
}

/**
 * Base error class for all pgmutate errors.
 */
export class PgMutateError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PgMutateError';
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
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends PgMutateError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Compile-time configuration errors in an action definition.
 * Error codes: C001-C007
 */
export class CompileError extends PgMutateError {
  constructor(code: string, message: string, location: CompileLocation = {}) {
    super(code, withLocation(message, location), { ...location });
    this.name = 'CompileError';
  }
}

/**
 * An entity ID binding or parameter that was never established.
 * Error codes: B001-B002
 */
export class BindingError extends PgMutateError {
  constructor(code: string, message: string, location: CompileLocation = {}) {
    super(code, withLocation(message, location), { ...location });
    this.name = 'BindingError';
  }
}

/**
 * Unsafe or malformed step expressions.
 * Error codes: X001-X002
 */
export class ExpressionError extends PgMutateError {
  constructor(
    code: string,
    message: string,
    location: CompileLocation = {},
    details: Record<string, unknown> = {}
  ) {
    super(code, withLocation(message, location), { ...location, ...details });
    this.name = 'ExpressionError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 * Error codes: S001-S003
 */
export class SystemError extends PgMutateError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

function withLocation(message: string, location: CompileLocation): string {
  const parts: string[] = [];
  if (location.entity) parts.push(`entity ${location.entity}`);
  if (location.action) parts.push(`action ${location.action}`);
  if (location.stepIndex !== undefined) parts.push(`step ${location.stepIndex}`);
  return parts.length > 0 ? `${message} (${parts.join(', ')})` : message;
}

export const ErrorCodes = {
  // Compile errors (C001-C007)
  CDC_WITHOUT_IMPACT: 'C001',
  INCOMPATIBLE_SIDE_EFFECT: 'C002',
  UNKNOWN_STEP_KIND: 'C003',
  UNMAPPED_OPERATION: 'C004',
  EMPTY_ACTION: 'C005',
  DUPLICATE_ACTION: 'C006',
  INVALID_IDENTIFIER: 'C007',

  // Binding errors (B001-B002)
  UNDEFINED_BINDING: 'B001',
  UNKNOWN_PARAMETER: 'B002',

  // Expression errors (X001-X002)
  UNSAFE_EXPRESSION: 'X001',
  MALFORMED_EXPRESSION: 'X002',

  // System errors (S001-S003)
  PARSE_ERROR: 'S001',
  INVALID_ENTITY_FILE: 'S002',
  CONFIG_LOAD_ERROR: 'S003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Warning codes. Warnings never block code generation.
 */
export const WarningCodes = {
  UNKNOWN_FILTER_ENTITY: 'W001',
  CASCADE_WITHOUT_IMPACT: 'W002',
  INCLUDE_CASCADE_WITHOUT_CASCADE: 'W003',
  UNKNOWN_STEP_ENTITY: 'W004',
} as const;

export type WarningCode = (typeof WarningCodes)[keyof typeof WarningCodes];
