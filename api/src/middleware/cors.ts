/**
 * CORS Middleware
 *
 * Bearer-token API: no cookies, so credentials are never allowed.
 * `*` in CORS_ORIGINS opens the API to every origin.
 */

import { cors } from 'hono/cors';
import type { MiddlewareHandler } from 'hono';
import type { HonoEnv } from '@/types/hono';

export function createCors(allowedOrigins: string[]): MiddlewareHandler<HonoEnv> {
  const allowAll = allowedOrigins.includes('*');
  return cors({
    origin: (origin) => {
      if (allowAll) return origin || '*';
      return allowedOrigins.includes(origin) ? origin : '';
    },
    allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization'],
    exposeHeaders: ['Content-Length', 'X-Request-ID', 'X-RateLimit-Remaining'],
    maxAge: 86400, // 24 hours
  });
}
