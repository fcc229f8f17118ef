export interface RateLimitInfo {
  limit?: number;
  remaining?: number;
  reset?: number;
  retryAfter?: number;
}

export interface GroundworkErrorContext {
  status: number;
  code: string;
  details?: unknown;
  headers?: Record<string, string>;
  rateLimit?: RateLimitInfo;
}

export class GroundworkError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: unknown;
  readonly headers: Record<string, string>;
  readonly rateLimit?: RateLimitInfo;

  constructor(message: string, context: GroundworkErrorContext) {
    super(message);
    this.name = 'GroundworkError';
    this.status = context.status;
    this.code = context.code;
    this.details = context.details;
    this.headers = context.headers ?? {};
    this.rateLimit = context.rateLimit;
  }
}

export class GroundworkAuthError extends GroundworkError {
  constructor(message: string, context: GroundworkErrorContext) {
    super(message, context);
    this.name = 'GroundworkAuthError';
  }
}

export class GroundworkNotFoundError extends GroundworkError {
  constructor(message: string, context: GroundworkErrorContext) {
    super(message, context);
    this.name = 'GroundworkNotFoundError';
  }
}

/** A write against a closed session */
export class GroundworkConflictError extends GroundworkError {
  constructor(message: string, context: GroundworkErrorContext) {
    super(message, context);
    this.name = 'GroundworkConflictError';
  }
}

export class GroundworkRateLimitError extends GroundworkError {
  constructor(message: string, context: GroundworkErrorContext) {
    super(message, context);
    this.name = 'GroundworkRateLimitError';
  }
}

export class GroundworkValidationError extends GroundworkError {
  constructor(message: string, context: GroundworkErrorContext) {
    super(message, context);
    this.name = 'GroundworkValidationError';
  }
}

/**
 * Retrieval or generation backend failure (502). The user message is
 * already stored when this comes back from chat.
 */
export class GroundworkUpstreamError extends GroundworkError {
  constructor(message: string, context: GroundworkErrorContext) {
    super(message, context);
    this.name = 'GroundworkUpstreamError';
  }
}

export class GroundworkServerError extends GroundworkError {
  constructor(message: string, context: GroundworkErrorContext) {
    super(message, context);
    this.name = 'GroundworkServerError';
  }
}

export function createGroundworkError(
  message: string,
  context: GroundworkErrorContext,
): GroundworkError {
  if (context.status === 401 || context.status === 403) {
    return new GroundworkAuthError(message, context);
  }

  if (context.status === 404) {
    return new GroundworkNotFoundError(message, context);
  }

  if (context.status === 409 || context.code === 'SESSION_CLOSED') {
    return new GroundworkConflictError(message, context);
  }

  if (context.status === 429 || context.code === 'RATE_LIMIT_EXCEEDED') {
    return new GroundworkRateLimitError(message, context);
  }

  if (context.status === 400 || context.status === 422) {
    return new GroundworkValidationError(message, context);
  }

  if (
    context.status === 502 ||
    context.code === 'RETRIEVAL_FAILED' ||
    context.code === 'GENERATION_FAILED'
  ) {
    return new GroundworkUpstreamError(message, context);
  }

  if (context.status >= 500) {
    return new GroundworkServerError(message, context);
  }

  return new GroundworkError(message, context);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Typed error from the API's `{ error: { code, message, details } }`
 * envelope. A body without one yields a status-derived code.
 */
export function errorFromEnvelope(
  status: number,
  body: unknown,
  extra: Pick<GroundworkErrorContext, 'headers' | 'rateLimit'> = {},
): GroundworkError {
  const envelope: Record<string, unknown> = isRecord(body) && isRecord(body.error) ? body.error : {};
  const code = typeof envelope.code === 'string' ? envelope.code : `HTTP_${status}`;
  const message =
    typeof envelope.message === 'string' ? envelope.message : `Groundwork API responded with status ${status}`;

  return createGroundworkError(message, { status, code, details: envelope.details, ...extra });
}
