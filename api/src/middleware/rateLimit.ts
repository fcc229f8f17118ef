/**
 * Rate Limiting Middleware
 *
 * Returns 429 Too Many Requests when a user's chat budget is spent.
 * Runs after auth so the key is the user, not the address.
 */

import type { MiddlewareHandler } from 'hono';
import type { HonoEnv } from '@/types/hono';
import { getRateLimitKey, type RateLimitService } from '@/services/rateLimit.service';

export function createRateLimit(service: RateLimitService): MiddlewareHandler<HonoEnv> {
  return async (c, next) => {
    const ip =
      c.req.header('x-forwarded-for')?.split(',')[0]?.trim() || c.req.header('x-real-ip') || 'unknown';
    const key = getRateLimitKey({ userId: c.get('userId'), ip });

    const result = await service.consume(key);

    c.header('X-RateLimit-Limit', String(result.limit));
    c.header('X-RateLimit-Remaining', String(result.remainingPoints));
    c.header('X-RateLimit-Reset', String(result.resetTime));

    if (!result.allowed) {
      c.header('Retry-After', String(result.retryAfter || 60));

      return c.json(
        {
          error: {
            code: 'RATE_LIMIT_EXCEEDED',
            message: 'Too many requests. Please try again later.',
            details: { retryAfter: result.retryAfter },
          },
        },
        429,
      );
    }

    return next();
  };
}
