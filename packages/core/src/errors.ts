/**
 * Custom error classes for the assessment platform
 * These errors carry safe, PHI-free messages that can be shown to a caller
 */

export interface SafeErrorDetails {
  code: string;
  message: string;
  statusCode: number;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get safe error details for API response (no sensitive info)
   */
  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Validation error for input that does not match the expected shape
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * An assessment cannot be scored because a field that materially changes the
 * baseline risk (age, sex) is absent. Surfaced to the user as a form error.
 */
export class AssessmentPreconditionError extends AppError {
  public readonly missingFields: readonly string[];

  constructor(missingFields: readonly string[]) {
    super(
      `Assessment requires ${missingFields.join(' and ')} to compute a risk score`,
      'ASSESSMENT_PRECONDITION_FAILED',
      422
    );
    this.name = 'AssessmentPreconditionError';
    this.missingFields = missingFields;
  }
}

/**
 * The assessment history collaborator failed to record a result
 */
export class HistoryStoreError extends AppError {
  public readonly originalError: Error | undefined;

  constructor(message: string, originalError?: Error) {
    super(`Assessment history store error: ${message}`, 'HISTORY_STORE_ERROR', 503);
    this.name = 'HistoryStoreError';
    this.originalError = originalError;
  }
}

/**
 * Configuration error (invalid environment variables)
 */
export class ConfigurationError extends AppError {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIGURATION_ERROR', 500);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Convert unknown error to safe error response
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  if (isOperationalError(error)) {
    return error.toSafeError();
  }

  // For unexpected errors, return a generic message
  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  };
}
