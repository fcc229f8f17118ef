/**
 * Request Context Middleware
 *
 * Assigns a request id (or adopts the caller's X-Request-ID) and binds a
 * child logger carrying it. The logger picks up the user id once auth has
 * resolved it.
 */

import { randomUUID } from 'node:crypto';
import type { MiddlewareHandler } from 'hono';
import type { HonoEnv } from '@/types/hono';
import type { Logger } from '@/utils/logger';

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

export function createRequestContext(baseLogger: Logger): MiddlewareHandler<HonoEnv> {
  return async (c, next) => {
    const incoming = c.req.header('X-Request-ID');
    const requestId = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : randomUUID();

    c.set('requestId', requestId);
    c.set('logger', baseLogger.child({ requestId }));
    c.header('X-Request-ID', requestId);

    const started = Date.now();
    await next();

    c.get('logger').debug('Request completed', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      userId: c.get('userId'),
      durationMs: Date.now() - started,
    });
  };
}
