/**
 * Error Handler
 *
 * Maps domain errors, validation failures and unexpected exceptions onto
 * the `{ error: { code, message, details? } }` envelope. Stack traces,
 * driver messages and provider credentials never reach the client.
 */

import type { Context, ErrorHandler, NotFoundHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ZodError } from 'zod';
import { isAppError, type ErrorStatus } from '@/errors';
import type { HonoEnv } from '@/types/hono';
import { logger } from '@/utils/logger';

/**
 * Error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

// Only show verbose errors in development and test,
// never in staging or production
function isVerboseErrors(): boolean {
  const env = process.env.NODE_ENV;
  return env === 'development' || env === 'test';
}

export interface MappedError {
  status: ErrorStatus | ContentfulStatusCode;
  body: ErrorResponse;
}

const HTTP_EXCEPTION_CODES: Partial<Record<number, string>> = {
  400: 'VALIDATION_ERROR',
  401: 'UNAUTHENTICATED',
  403: 'FORBIDDEN',
  404: 'NOT_FOUND',
  413: 'PAYLOAD_TOO_LARGE',
  415: 'UNSUPPORTED_MEDIA_TYPE',
  429: 'RATE_LIMIT_EXCEEDED',
};

export function toErrorResponse(error: unknown): MappedError {
  if (isAppError(error)) {
    // 5xx messages can carry upstream detail; 4xx messages are written for clients
    const exposeMessage = error.status < 500 || isVerboseErrors();
    return {
      status: error.status,
      body: {
        error: {
          code: error.code,
          message: exposeMessage ? error.message : defaultMessage(error.status),
          ...(error.details ? { details: error.details } : {}),
        },
      },
    };
  }

  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: error.issues,
        },
      },
    };
  }

  // Hono raises these for malformed bodies and guard failures
  if (error instanceof HTTPException && error.status < 500) {
    return {
      status: error.status,
      body: {
        error: {
          code: HTTP_EXCEPTION_CODES[error.status] ?? 'BAD_REQUEST',
          message: error.message || defaultClientMessage(error.status),
        },
      },
    };
  }

  return {
    status: 500,
    body: {
      error: {
        code: 'INTERNAL_ERROR',
        message: isVerboseErrors() && error instanceof Error ? error.message : 'An internal error occurred',
      },
    },
  };
}

function defaultClientMessage(status: number): string {
  return status === 401 ? 'Authentication required' : 'Request rejected';
}

function defaultMessage(status: ErrorStatus): string {
  switch (status) {
    case 502:
      return 'An upstream service failed';
    case 503:
      return 'Service temporarily unavailable';
    default:
      return 'An internal error occurred';
  }
}

export const errorHandler: ErrorHandler<HonoEnv> = (error, c: Context<HonoEnv>) => {
  const mapped = toErrorResponse(error);
  const log = c.get('logger') ?? logger;
  const context = {
    code: mapped.body.error.code,
    status: mapped.status,
    error: error.message,
    path: c.req.path,
    method: c.req.method,
  };

  if (mapped.status >= 500) {
    log.error('Request failed', {
      ...context,
      stack: error.stack,
      cause: error.cause ? String(error.cause) : undefined,
    });
  } else {
    log.info('Request rejected', context);
  }

  return c.json(mapped.body, mapped.status);
};

export const notFoundHandler: NotFoundHandler<HonoEnv> = (c) => {
  return c.json<ErrorResponse>(
    {
      error: {
        code: 'NOT_FOUND',
        message: 'Endpoint not found',
      },
    },
    404,
  );
};
