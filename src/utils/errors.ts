/**
 * Error types and codes for refgraph.
 * All errors thrown by the library extend RefGraphError.
 */

/**
 * Base error class for all refgraph errors.
 */
export class RefGraphError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RefGraphError';
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
export class ConfigError extends RefGraphError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * A document could not be read, parsed, or has an unsupported extension.
 */
export class LoadError extends RefGraphError {
  constructor(
    code: string,
    message: string,
    public readonly documentPath: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, { documentPath, ...details });
    this.name = 'LoadError';
  }
}

/**
 * A walk tried to descend into a scalar, or indexed a list with a non-numeric segment.
 */
export class NavigationError extends RefGraphError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'NavigationError';
  }
}

/**
 * A fragment was projected to a kind its value does not have.
 */
export class TypeMismatchError extends RefGraphError {
  constructor(
    message: string,
    public readonly reference: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(ErrorCodes.TYPE_MISMATCH, message, { reference, expected, actual });
    this.name = 'TypeMismatchError';
  }
}

/**
 * Resolution of a reference failed.
 */
export class ResolutionError extends RefGraphError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ResolutionError';
  }
}

/**
 * A required coordinate has no value.
 */
export class NotFoundError extends ResolutionError {
  constructor(message: string, public readonly reference: string) {
    super(ErrorCodes.NOT_FOUND, message, { reference });
    this.name = 'NotFoundError';
  }
}

/**
 * An indirection chain points back at a coordinate already on the chain.
 */
export class CircularReferenceError extends ResolutionError {
  constructor(message: string, public readonly chain: string[]) {
    super(ErrorCodes.CIRCULAR_REFERENCE, message, { chain });
    this.name = 'CircularReferenceError';
  }
}

export const ErrorCodes = {
  // Load errors
  LOAD_FAILED: 'LOAD_FAILED',
  PARSE_ERROR: 'PARSE_ERROR',
  UNSUPPORTED_EXTENSION: 'UNSUPPORTED_EXTENSION',
  DOCUMENT_NOT_FOUND: 'DOCUMENT_NOT_FOUND',
  INVALID_DOCUMENT: 'INVALID_DOCUMENT',

  // Navigation errors
  SCALAR_DESCENT: 'SCALAR_DESCENT',
  INVALID_INDEX: 'INVALID_INDEX',

  // Projection errors
  TYPE_MISMATCH: 'TYPE_MISMATCH',

  // Resolution errors
  INVALID_REFERENCE: 'INVALID_REFERENCE',
  NOT_FOUND: 'NOT_FOUND',
  CIRCULAR_REFERENCE: 'CIRCULAR_REFERENCE',
  MAX_DEPTH_EXCEEDED: 'MAX_DEPTH_EXCEEDED',

  // Configuration errors
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
