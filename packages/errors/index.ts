/**
* Unified Error Handling Package
*
* Standard error classes and codes shared by services, workers and routes.
*
* Standard Error Format:
* {
*   error: string;       // Human-readable error message
*   code: string;        // Machine-readable error code
*   details?: unknown;   // Additional error details (validation issues, etc.)
*   requestId?: string;  // Request ID for tracing
* }
*/

// ============================================================================
// Error Code Constants
// ============================================================================

export const ErrorCodes = {
  // Validation Errors
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_PARAMS: 'INVALID_PARAMS',
  INVALID_NETWORK: 'INVALID_NETWORK',
  INVALID_STATE_TRANSITION: 'INVALID_STATE_TRANSITION',

  // Resource Errors
  NOT_FOUND: 'NOT_FOUND',
  CONTENT_NOT_FOUND: 'CONTENT_NOT_FOUND',
  PUBLICATION_NOT_FOUND: 'PUBLICATION_NOT_FOUND',

  // Conflict Errors
  CONFLICT: 'CONFLICT',

  // Database Errors
  DATABASE_ERROR: 'DATABASE_ERROR',

  // Service Errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  DISPATCH_FAILED: 'DISPATCH_FAILED',

  // External API Errors
  EXTERNAL_API_ERROR: 'EXTERNAL_API_ERROR',
  PUBLISH_FAILED: 'PUBLISH_FAILED',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

const KNOWN_ERROR_CODES: readonly string[] = Object.values(ErrorCodes);

/**
* Narrow an arbitrary string to a known ErrorCode
*/
export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && KNOWN_ERROR_CODES.includes(value);
}

// ============================================================================
// Error Response Interface
// ============================================================================

/**
 * Standardized error response shape returned by all API endpoints.
 */
export interface ErrorResponse {
  error: string;
  code: ErrorCode;
  /** Hidden outside development */
  details?: unknown;
  requestId?: string;
}

// ============================================================================
// Base Application Error Class
// ============================================================================

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  public readonly statusCode: number;

  constructor(
  message: string,
  code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
  statusCode: number = 500,
  details?: unknown,
  options?: { cause?: Error }
  ) {
  super(message, options?.cause ? { cause: options.cause } : undefined);
  this.name = this.constructor.name;
  this.code = code;
  this.statusCode = statusCode;
  this.details = details;

  if (Error.captureStackTrace) {
    Error.captureStackTrace(this, this.constructor);
  }
  }

  toJSON(): ErrorResponse {
  return {
    error: this.message,
    code: this.code,
    ...(this.details !== undefined && { details: this.details }),
  };
  }
}

// ============================================================================
// Specific Error Classes
// ============================================================================

export interface ValidationIssue {
  path: (string | number)[];
  message: string;
  code: string;
}

export class ValidationError extends AppError {
  constructor(
  message: string = 'Validation failed',
  details?: unknown,
  code: ErrorCode = ErrorCodes.VALIDATION_ERROR
  ) {
  super(message, code, 400, details);
  }

  /**
  * Create ValidationError from Zod error issues
  */
  static fromZodIssues(issues: ReadonlyArray<ValidationIssue>): ValidationError {
  const first = issues[0];
  const message = first
    ? `Validation failed: ${first.path.length > 0 ? `${first.path.join('.')}: ` : ''}${first.message}`
    : 'Validation failed';
  return new ValidationError(
    message,
    issues.map(issue => ({
    path: issue.path,
    message: issue.message,
    code: issue.code,
    })),
  );
  }
}

export class NotFoundError extends AppError {
  constructor(
  resource: string = 'Resource',
  code: ErrorCode = ErrorCodes.NOT_FOUND
  ) {
  super(`${resource} not found`, code, 404);
  }

  static content(): NotFoundError {
  return new NotFoundError('Content item', ErrorCodes.CONTENT_NOT_FOUND);
  }

  static publication(): NotFoundError {
  return new NotFoundError('Publication', ErrorCodes.PUBLICATION_NOT_FOUND);
  }
}

export class ConflictError extends AppError {
  constructor(
  message: string = 'Resource conflict',
  details?: unknown
  ) {
  super(message, ErrorCodes.CONFLICT, 409, details);
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(
  message: string = 'Service temporarily unavailable',
  code: ErrorCode = ErrorCodes.SERVICE_UNAVAILABLE,
  options?: { cause?: Error }
  ) {
  super(message, code, 503, undefined, options);
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
* Detailed error info is exposed to clients only in development
*/
export function shouldExposeErrorDetails(): boolean {
  return process.env['NODE_ENV'] === 'development';
}

/**
 * Extract error message from unknown catch parameter.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export { createRouteErrorHandler } from './route-error-handler';
