/**
 * Application error taxonomy. Every error a service raises on purpose extends
 * AppError so the HTTP error handler can map it to a status and error code.
 */

export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  CAPACITY_EXCEEDED = 'CAPACITY_EXCEEDED',
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number = 500,
    code: ErrorCode = ErrorCode.INTERNAL_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;

    // Keep instanceof working for subclasses of Error
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * 400 - input is structurally or semantically invalid
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(message: string = 'Validation failed', errors: ValidationErrorDetail[] = []) {
    super(message, 400, ErrorCode.VALIDATION_ERROR, { errors });
    this.errors = errors;
  }

  static forField(field: string, message: string): ValidationError {
    return new ValidationError(message, [{ field, message }]);
  }

  static fromZodError(zodError: { issues: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const errors = zodError.issues.map(issue => ({
      field: issue.path.join('.') || 'body',
      message: issue.message
    }));
    return new ValidationError('Validation failed', errors);
  }
}

/**
 * 404 - referenced ride, event or user does not exist
 */
export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found', details?: Record<string, unknown>) {
    super(message, 404, ErrorCode.NOT_FOUND, details);
  }
}

/**
 * 409 - unique field already taken
 */
export class ConflictError extends AppError {
  constructor(message: string = 'Resource conflict', details?: Record<string, unknown>) {
    super(message, 409, ErrorCode.CONFLICT, details);
  }
}

/**
 * 409 - a ride already holds the maximum number of events
 */
export class CapacityExceededError extends AppError {
  public readonly limit: number;

  constructor(limit: number, message: string = `Ride already has the maximum of ${limit} events`) {
    super(message, 409, ErrorCode.CAPACITY_EXCEEDED, { limit });
    this.limit = limit;
  }
}

/** PostgreSQL SQLSTATE for unique_violation */
export const PG_UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === PG_UNIQUE_VIOLATION
  );
}
