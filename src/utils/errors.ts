/**
 * Unified Error Handling System
 *
 * Provides standardized error types and codes for the memory engine.
 */

// ============================================
// Error Codes
// ============================================

export const ErrorCodes = {
  // Episodic Errors
  INVALID_EVENT: 'INVALID_EVENT',

  // Semantic Errors
  MISSING_TEXT: 'MISSING_TEXT',
  ENCODER_FAILURE: 'ENCODER_FAILURE',

  // Config Errors
  CONFIG_VALIDATION: 'CONFIG_VALIDATION',

  // System Errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
} as const;

export type ErrorCodeType = typeof ErrorCodes[keyof typeof ErrorCodes];

// ============================================
// Base Memory Error
// ============================================

export class MemoryError extends Error {
  readonly code: ErrorCodeType;
  readonly details?: unknown;
  readonly timestamp: Date;
  readonly causeError?: Error;

  constructor(
    code: ErrorCodeType,
    message: string,
    options?: {
      details?: unknown;
      cause?: Error;
    }
  ) {
    super(message);
    this.name = 'MemoryError';
    this.code = code;
    this.details = options?.details;
    this.causeError = options?.cause;
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.causeError instanceof Error
        ? { message: this.causeError.message, stack: this.causeError.stack }
        : undefined,
    };
  }
}

// ============================================
// Specialized Error Classes
// ============================================

export class InvalidEventError extends MemoryError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(ErrorCodes.INVALID_EVENT, message, { details: { issues } });
    this.name = 'InvalidEventError';
    this.issues = issues;
  }
}

export class MissingTextError extends MemoryError {
  readonly documentId?: string;

  constructor(documentId?: string) {
    super(
      ErrorCodes.MISSING_TEXT,
      documentId ? `Document '${documentId}' has no text` : 'Document has no text',
      { details: { documentId } }
    );
    this.name = 'MissingTextError';
    this.documentId = documentId;
  }
}

/**
 * Raised when the encoder hands back a vector the store cannot use.
 * Exceptions thrown by the encoder itself are not wrapped.
 */
export class EncoderFailureError extends MemoryError {
  constructor(message: string, details?: unknown) {
    super(ErrorCodes.ENCODER_FAILURE, message, { details });
    this.name = 'EncoderFailureError';
  }
}

export class ConfigError extends MemoryError {
  readonly field?: string;

  constructor(
    message: string,
    options?: {
      field?: string;
      details?: unknown;
      cause?: Error;
    }
  ) {
    super(ErrorCodes.CONFIG_VALIDATION, message, options);
    this.name = 'ConfigError';
    this.field = options?.field;
  }
}

// ============================================
// Error Utilities
// ============================================

export function isMemoryError(error: unknown): error is MemoryError {
  return error instanceof MemoryError;
}

export function toMemoryError(error: unknown): MemoryError {
  if (isMemoryError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new MemoryError(
      ErrorCodes.UNKNOWN_ERROR,
      error.message,
      { cause: error }
    );
  }

  return new MemoryError(
    ErrorCodes.UNKNOWN_ERROR,
    String(error)
  );
}
