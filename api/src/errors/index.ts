/**
 * Domain Errors
 *
 * Every error carries a stable `code` string and the HTTP status the
 * error handler maps it to. Messages never include stack traces,
 * connection strings or provider credentials.
 */

export type ErrorStatus = 400 | 404 | 409 | 429 | 500 | 502 | 503;

export type ErrorKind =
  | 'VALIDATION_ERROR'
  | 'SESSION_CLOSED'
  | 'NOT_FOUND'
  | 'RETRIEVAL_FAILED'
  | 'GENERATION_FAILED'
  | 'PERSISTENCE_FAILED';

export class AppError extends Error {
  readonly code: ErrorKind;
  readonly status: ErrorStatus;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorKind,
    message: string,
    status: ErrorStatus,
    options: { details?: Record<string, unknown>; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AppError';
    this.code = code;
    this.status = status;
    this.details = options.details;
  }
}

/**
 * Malformed input: role, content, vote flags, closed session.
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    options: { code?: 'VALIDATION_ERROR' | 'SESSION_CLOSED'; details?: Record<string, unknown> } = {},
  ) {
    const code = options.code ?? 'VALIDATION_ERROR';
    super(code, message, code === 'SESSION_CLOSED' ? 409 : 400, { details: options.details });
    this.name = 'ValidationError';
  }
}

/**
 * Absent or not owned by the caller. The two cases share one message so
 * a caller cannot learn which identifiers belong to other users.
 */
export class NotFoundError extends AppError {
  readonly resource: 'session' | 'message';

  constructor(resource: 'session' | 'message') {
    super('NOT_FOUND', `${resource === 'session' ? 'Session' : 'Message'} not found`, 404);
    this.name = 'NotFoundError';
    this.resource = resource;
  }
}

export class RetrievalError extends AppError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super('RETRIEVAL_FAILED', message, 502, options);
    this.name = 'RetrievalError';
  }
}

export class GenerationError extends AppError {
  constructor(message: string, options: { details?: Record<string, unknown>; cause?: unknown } = {}) {
    super('GENERATION_FAILED', message, 502, options);
    this.name = 'GenerationError';
  }
}

export class PersistenceError extends AppError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super('PERSISTENCE_FAILED', message, 503, options);
    this.name = 'PersistenceError';
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
