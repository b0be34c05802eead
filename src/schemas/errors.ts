/**
 * Groundline Error Schemas
 *
 * Error classes raised by the engine, and the standardized response
 * envelope the HTTP API maps them to.
 */

import type { Timestamp } from './models.js';

// ============================================================================
// ERROR CODES
// ============================================================================

export enum ErrorCode {
  // Authentication errors (401)
  UNAUTHORIZED = 'UNAUTHORIZED',
  INVALID_TOKEN = 'INVALID_TOKEN',

  // Authorization errors (403)
  FORBIDDEN = 'FORBIDDEN',

  // Not found errors (404)
  NOT_FOUND = 'NOT_FOUND',
  CHANNEL_NOT_FOUND = 'CHANNEL_NOT_FOUND',
  PROPOSAL_NOT_FOUND = 'PROPOSAL_NOT_FOUND',
  THREAD_NOT_FOUND = 'THREAD_NOT_FOUND',

  // Validation errors (400)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_FORMAT = 'INVALID_FORMAT',

  // Conflict errors (409)
  CONFLICT = 'CONFLICT',
  ALREADY_INITIALIZED = 'ALREADY_INITIALIZED',
  INVALID_TRANSITION = 'INVALID_TRANSITION',

  // Business logic errors (422)
  INVARIANT_VIOLATION = 'INVARIANT_VIOLATION',

  // Server errors (500)
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  STORAGE_ERROR = 'STORAGE_ERROR',
  INFERENCE_UNAVAILABLE = 'INFERENCE_UNAVAILABLE',
  TIMEOUT = 'TIMEOUT'
}

// ============================================================================
// ERROR CLASSES
// ============================================================================

export class GroundlineError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'GroundlineError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The inference collaborator timed out, threw, or answered with something
 * unusable. Callers degrade instead of propagating it to users.
 */
export class TransientInferenceError extends GroundlineError {
  public readonly operation: string;
  public override readonly cause: unknown;

  constructor(operation: string, cause: unknown, code: ErrorCode = ErrorCode.INFERENCE_UNAVAILABLE) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(code, `${operation} failed: ${reason}`);
    this.name = 'TransientInferenceError';
    this.operation = operation;
    this.cause = cause;
  }
}

/**
 * A mutation would break a document invariant. The mutation is rejected and
 * nothing partial is persisted.
 */
export class InvariantViolationError extends GroundlineError {
  public readonly violations: string[];

  constructor(message: string, violations: string[] = []) {
    super(ErrorCode.INVARIANT_VIOLATION, message);
    this.name = 'InvariantViolationError';
    this.violations = violations;
  }
}

/**
 * Thrown when a storage write or read fails.
 *
 * Carries the storage operation plus the underlying cause so callers can
 * decide whether to retry or surface the error.
 */
export class StorageError extends GroundlineError {
  public readonly operation: string;
  public override readonly cause: unknown;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(ErrorCode.STORAGE_ERROR, `Storage ${operation} failed: ${reason}`);
    this.name = 'StorageError';
    this.operation = operation;
    this.cause = cause;
  }
}

export class InvalidTransitionError extends GroundlineError {
  constructor(message: string) {
    super(ErrorCode.INVALID_TRANSITION, message);
    this.name = 'InvalidTransitionError';
  }
}

export class NotFoundError extends GroundlineError {
  public readonly resourceType: NotFoundErrorDetails['resourceType'];
  public readonly identifier: string;

  constructor(resourceType: NotFoundErrorDetails['resourceType'], identifier: string) {
    super(notFoundCodes[resourceType], `${resourceType} not found: ${identifier}`);
    this.name = 'NotFoundError';
    this.resourceType = resourceType;
    this.identifier = identifier;
  }
}

export class ConflictError extends GroundlineError {
  constructor(message: string, code: ErrorCode = ErrorCode.CONFLICT) {
    super(code, message);
    this.name = 'ConflictError';
  }
}

// ============================================================================
// ERROR RESPONSE STRUCTURE
// ============================================================================

export interface ErrorResponse {
  /** Whether the request succeeded (always false for errors) */
  success: false;
  error: ErrorDetail;
  metadata: {
    timestamp: Timestamp;
  };
}

export interface ErrorDetail {
  /** Machine-readable error code */
  code: ErrorCode;
  /** Human-readable error message */
  message: string;
  /** HTTP status code */
  status: number;
  details?: ErrorDetails;
  /** Whether the client should retry */
  retryable: boolean;
}

export type ErrorDetails =
  | ValidationErrorDetails
  | NotFoundErrorDetails;

export interface ValidationErrorDetails {
  type: 'validation';
  errors: ValidationFieldError[];
}

export interface ValidationFieldError {
  /** Field path (e.g., "since" or "data.authorId") */
  field: string;
  message: string;
  code: string;
  /** The invalid value (if safe to expose) */
  value?: unknown;
}

export interface NotFoundErrorDetails {
  type: 'not_found';
  resourceType: 'channel' | 'proposal' | 'thread' | 'document';
  identifier: string;
}

const notFoundCodes: Record<NotFoundErrorDetails['resourceType'], ErrorCode> = {
  channel: ErrorCode.CHANNEL_NOT_FOUND,
  proposal: ErrorCode.PROPOSAL_NOT_FOUND,
  thread: ErrorCode.THREAD_NOT_FOUND,
  document: ErrorCode.NOT_FOUND
};

// ============================================================================
// ERROR FACTORY FUNCTIONS
// ============================================================================

function envelope(error: ErrorDetail): ErrorResponse {
  return {
    success: false,
    error,
    metadata: { timestamp: new Date().toISOString() }
  };
}

export function createValidationError(errors: ValidationFieldError[]): ErrorResponse {
  return envelope({
    code: ErrorCode.VALIDATION_ERROR,
    message: `Validation failed: ${errors.length} error(s)`,
    status: 400,
    details: { type: 'validation', errors },
    retryable: false
  });
}

export function createUnauthorizedError(code: ErrorCode.UNAUTHORIZED | ErrorCode.INVALID_TOKEN, message: string): ErrorResponse {
  return envelope({ code, message, status: 401, retryable: false });
}

export function createPermissionError(permission: string): ErrorResponse {
  return envelope({
    code: ErrorCode.FORBIDDEN,
    message: `Permission denied: ${permission} required`,
    status: 403,
    retryable: false
  });
}

export function createNotFoundError(
  resourceType: NotFoundErrorDetails['resourceType'],
  identifier: string
): ErrorResponse {
  return envelope({
    code: notFoundCodes[resourceType],
    message: `${resourceType} not found: ${identifier}`,
    status: 404,
    details: { type: 'not_found', resourceType, identifier },
    retryable: false
  });
}

export function createInternalError(message: string = 'An internal error occurred'): ErrorResponse {
  return envelope({
    code: ErrorCode.INTERNAL_ERROR,
    message,
    status: 500,
    retryable: true
  });
}

/**
 * Map any thrown value onto the response envelope.
 */
export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof NotFoundError) {
    return createNotFoundError(err.resourceType, err.identifier);
  }
  if (err instanceof ConflictError || err instanceof InvalidTransitionError) {
    return envelope({ code: err.code, message: err.message, status: 409, retryable: false });
  }
  if (err instanceof InvariantViolationError) {
    return envelope({ code: err.code, message: err.message, status: 422, retryable: false });
  }
  if (err instanceof StorageError) {
    return envelope({ code: err.code, message: err.message, status: 500, retryable: true });
  }
  return createInternalError();
}
