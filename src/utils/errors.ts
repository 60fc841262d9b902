import { ZodError } from 'zod';
import type { FastifyRequest } from 'fastify';
import { getRequestId } from './request-id.js';

/**
 * Error codes for structured error responses
 */
export type ErrorCode = 'BAD_INPUT' | 'NOT_FOUND' | 'RATE_LIMITED' | 'INTERNAL';

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: 'error.v1';
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

// ============================================================================
// Error classes
// ============================================================================

/**
 * Base class for errors raised by this service.
 * `code` is stable and safe to expose; `message` may carry user-facing detail.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** The content extraction port could not read a source document. */
export class ExtractionError extends AppError {
  constructor(message: string, public readonly path: string, cause?: unknown) {
    super(message, 'EXTRACTION_ERROR', cause);
    this.name = 'ExtractionError';
  }
}

/** A storage backend rejected a write. */
export class PersistenceError extends AppError {
  constructor(message: string, public readonly target: string, cause?: unknown) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}

/** The user aborted an interactive prompt. */
export class ToneRequestCancelledError extends AppError {
  constructor(message = 'Tone request cancelled') {
    super(message, 'USER_CANCELLED');
    this.name = 'ToneRequestCancelledError';
  }
}

/**
 * A caller broke the graph's contract (e.g. a state without a session id).
 * Never converted into a turn error.
 */
export class InvariantViolationError extends AppError {
  constructor(message: string) {
    super(message, 'INVARIANT_VIOLATION');
    this.name = 'InvariantViolationError';
  }
}

export class SessionNotFoundError extends AppError {
  constructor(public readonly sessionId: string) {
    super(`Session not found: ${sessionId}`, 'SESSION_NOT_FOUND');
    this.name = 'SessionNotFoundError';
  }
}

export class RateLimitedError extends AppError {
  readonly statusCode = 429;

  constructor(public readonly retryAfterSeconds: number) {
    super('Too many requests', 'RATE_LIMITED');
    this.name = 'RateLimitedError';
  }
}

/**
 * Human-readable detail of an unknown thrown value, used in turn error messages.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

// ============================================================================
// error.v1 envelope
// ============================================================================

export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: 'error.v1',
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

/**
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError, requestId?: string): ErrorV1 {
  return buildErrorV1(
    'BAD_INPUT',
    'Validation failed',
    {
      validation_errors: error.flatten(),
    },
    requestId
  );
}

function sanitizeMessage(message: string): string {
  return message
    // File paths
    .replace(/\/[\w/.@-]+/g, '[path]')
    // Secrets in env-style assignments
    .replace(/[A-Z_]+_?KEY=\S+/gi, '[KEY_REDACTED]')
    .replace(/[A-Z_]+_?SECRET=\S+/gi, '[SECRET_REDACTED]')
    // Email addresses
    .replace(/[\w.-]+@[\w.-]+\.\w+/g, '[email]');
}

/**
 * Convert any error to ErrorV1 (safe, never leaks stack/PII)
 */
export function toErrorV1(error: unknown, request?: FastifyRequest): ErrorV1 {
  const requestId = request ? getRequestId(request) : undefined;

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  if (error instanceof SessionNotFoundError) {
    return buildErrorV1('NOT_FOUND', error.message, { session_id: error.sessionId }, requestId);
  }

  if (error instanceof RateLimitedError) {
    return buildErrorV1('RATE_LIMITED', error.message, { retry_after_seconds: error.retryAfterSeconds }, requestId);
  }

  if (error instanceof InvariantViolationError) {
    return buildErrorV1('INTERNAL', error.message, { code: error.code }, requestId);
  }

  // Fastify's own client errors (malformed JSON, body too large) carry a 4xx statusCode
  if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500) {
    return buildErrorV1('BAD_INPUT', sanitizeMessage(error.message), undefined, requestId);
  }

  if (error instanceof Error) {
    return buildErrorV1('INTERNAL', sanitizeMessage(error.message || 'An unexpected error occurred'), undefined, requestId);
  }

  if (typeof error === 'string') {
    return buildErrorV1('INTERNAL', sanitizeMessage(error), undefined, requestId);
  }

  return buildErrorV1('INTERNAL', 'An unexpected error occurred', undefined, requestId);
}

/**
 * Get HTTP status code for error code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case 'BAD_INPUT':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'RATE_LIMITED':
      return 429;
    case 'INTERNAL':
    default:
      return 500;
  }
}
