/**
 * Security Headers Middleware
 *
 * JSON-only API: nothing is ever rendered, framed or scripted.
 */

import type { MiddlewareHandler } from 'hono';
import type { HonoEnv } from '@/types/hono';

export const securityHeaders: MiddlewareHandler<HonoEnv> = async (c, next) => {
  c.header('X-Frame-Options', 'DENY');
  c.header('X-Content-Type-Options', 'nosniff');
  c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
  c.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
  c.header('Referrer-Policy', 'no-referrer');
  return next();
};
