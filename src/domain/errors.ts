/**
 * Application error types
 * Each error type maps to specific HTTP status codes and client actions
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export type ValidationConstraint =
  | 'REQUIRED_FIELD'
  | 'UNKNOWN_CODE'
  | 'NOT_FINITE'
  | 'OUT_OF_RANGE'
  | 'INVALID_PAYLOAD'
  | 'INVALID_TRANSITION'
  | 'INVALID_QUERY';

/**
 * Validation errors from user input (400 Bad Request)
 * Carries the failed constraint and the offending value for audit metadata
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly constraint: ValidationConstraint,
    public readonly field: string | null = null,
    public readonly value: unknown = null,
    details?: unknown
  ) {
    super(message, 'VALIDATION_ERROR', 400, details ?? { constraint, field, value });
  }
}

/**
 * Request body the JSON parser refused: malformed (400), over the size limit (413)
 * or unreadable for another reason the parser reports
 */
export class PayloadError extends AppError {
  constructor(
    message: string,
    public readonly constraint: 'INVALID_JSON' | 'PAYLOAD_TOO_LARGE' | 'UNREADABLE_BODY',
    statusCode: number
  ) {
    super(message, constraint, statusCode);
  }
}

/**
 * Resource not found errors (404 Not Found)
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', 404, { resource, id });
  }
}

/**
 * Authorization denied for the resolved actor (403 Forbidden)
 */
export class AccessDeniedError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'ACCESS_DENIED', 403, details);
  }
}

/**
 * Base class for persistence store failures
 */
export abstract class StoreError extends AppError {
  abstract readonly retryable: boolean;
}

/**
 * Write rejected by a storage constraint (409 Conflict) - client-correctable
 */
export class StoreConstraintError extends StoreError {
  readonly retryable = false;

  constructor(message: string, details?: unknown) {
    super(message, 'STORE_CONSTRAINT', 409, details);
  }
}

/**
 * Storage backend unreachable or failing (503 Service Unavailable) - retryable by caller
 */
export class StoreUnavailableError extends StoreError {
  readonly retryable = true;

  constructor(message: string, details?: unknown) {
    super(message, 'STORE_UNAVAILABLE', 503, details);
  }
}

/**
 * Database operation errors (500 Internal Server Error)
 * Raised by DatabaseAdapter; repositories translate these into StoreError
 */
export class DatabaseError extends AppError {
  constructor(
    message: string,
    public readonly sqliteCode: string | null,
    details?: unknown
  ) {
    super(message, 'DATABASE_ERROR', 500, details);
  }

  isConstraintViolation(): boolean {
    return this.sqliteCode !== null && this.sqliteCode.startsWith('SQLITE_CONSTRAINT');
  }
}

/**
 * Configuration errors - fail fast on startup (500 Internal Server Error)
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', 500, details);
  }
}

/**
 * ML collaborator unreachable or answered badly (502 Bad Gateway)
 */
export class MlServiceError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'ML_SERVICE_ERROR', 502, details);
  }
}

/**
 * No ML collaborator configured (ML_SERVICE_URL unset)
 */
export class MlNotConfiguredError extends AppError {
  constructor() {
    super('ML service not configured', 'ML_NOT_CONFIGURED', 503);
  }
}

/**
 * Audit write failed. Logged operationally, never fails the parent operation.
 */
export class AuditError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuditError';
  }
}

/**
 * Reading source transport failure (serial disconnect, stream error).
 * Always retried inside the source adapter.
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * Delivery to a single live subscriber failed; the subscriber is dropped.
 */
export class SubscriberError extends Error {
  constructor(
    message: string,
    public readonly subscriberId: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SubscriberError';
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  return 'Unexpected error';
}
