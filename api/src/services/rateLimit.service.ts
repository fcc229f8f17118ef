/**
 * Rate Limiting Service
 *
 * Per-user request budget for the expensive chat endpoint. In-memory
 * store: limits are per process.
 */

import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';
import { logger } from '@/utils/logger';

const WINDOW_SECONDS = 60;

/**
 * Rate limit result for middleware response
 */
export interface RateLimitResult {
  allowed: boolean;
  limit: number;
  remainingPoints: number;
  resetTime: number; // Unix timestamp when limit resets
  retryAfter?: number; // Seconds to wait before retry
}

export class RateLimitService {
  private limiter: RateLimiterMemory;

  constructor(private readonly pointsPerMinute: number) {
    this.limiter = this.createLimiter();
  }

  /**
   * Consume one point for the key. Limiter failures other than an
   * exhausted budget fail open.
   */
  async consume(key: string): Promise<RateLimitResult> {
    try {
      const result: RateLimiterRes = await this.limiter.consume(key);
      return {
        allowed: true,
        limit: this.pointsPerMinute,
        remainingPoints: result.remainingPoints,
        resetTime: Math.floor((Date.now() + result.msBeforeNext) / 1000),
      };
    } catch (error) {
      if (error instanceof RateLimiterRes) {
        return {
          allowed: false,
          limit: this.pointsPerMinute,
          remainingPoints: 0,
          resetTime: Math.floor((Date.now() + error.msBeforeNext) / 1000),
          retryAfter: Math.ceil(error.msBeforeNext / 1000),
        };
      }

      logger.error('Rate limiter error', { error: String(error) });
      return {
        allowed: true,
        limit: this.pointsPerMinute,
        remainingPoints: this.pointsPerMinute,
        resetTime: Math.floor(Date.now() / 1000) + WINDOW_SECONDS,
      };
    }
  }

  /**
   * Clears all in-memory state (tests)
   */
  reset(): void {
    // RateLimiterMemory has no clear-all, so recreate it
    this.limiter = this.createLimiter();
  }

  private createLimiter(): RateLimiterMemory {
    return new RateLimiterMemory({ points: this.pointsPerMinute, duration: WINDOW_SECONDS });
  }
}

export function getRateLimitKey(context: { userId?: string; ip?: string }): string {
  if (context.userId) {
    return `user:${context.userId}`;
  }
  return `ip:${context.ip || 'unknown'}`;
}
