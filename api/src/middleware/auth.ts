/**
 * Authentication Middleware
 *
 * Identity is consumed, not issued: a Bearer JWT signed with HS256 whose
 * `oid` (or `sub`) claim is the user id. In test mode the
 * `x-test-user-id` header stands in for a token.
 *
 * Sets context variables:
 * - c.get('userId') - Authenticated user ID
 * - c.get('logger') - rebound with the user id
 */

import type { Context, MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { verify } from 'hono/jwt';
import type { HonoEnv } from '@/types/hono';
import { logger } from '@/utils/logger';

export interface AuthOptions {
  jwtSecret?: string;
  /** Accept x-test-user-id; only ever enabled when NODE_ENV=test */
  allowTestHeaders: boolean;
}

/**
 * Authentication resolver middleware
 *
 * Sets userId on context when a valid credential is present; routes
 * decide whether authentication is required.
 */
export function createAuthResolver(options: AuthOptions): MiddlewareHandler<HonoEnv> {
  return async (c, next) => {
    if (options.allowTestHeaders) {
      const testUserId = c.req.header('x-test-user-id');
      if (testUserId) {
        bindUser(c, testUserId);
        return next();
      }
      // No test header: fall through to bearer auth
    }

    const authHeader = c.req.header('Authorization');
    if (authHeader?.startsWith('Bearer ') && options.jwtSecret) {
      const userId = await resolveUserId(authHeader.substring(7), options.jwtSecret);
      if (userId) {
        bindUser(c, userId);
      }
    }

    return next();
  };
}

function bindUser(c: Context<HonoEnv>, userId: string): void {
  c.set('userId', userId);
  c.set('logger', (c.get('logger') ?? logger).child({ userId }));
}

async function resolveUserId(token: string, secret: string): Promise<string | null> {
  try {
    const payload = await verify(token, secret, 'HS256');
    if (typeof payload.oid === 'string' && payload.oid) return payload.oid;
    if (typeof payload.sub === 'string' && payload.sub) return payload.sub;
    logger.debug('JWT carries no user claim');
    return null;
  } catch (error) {
    logger.debug('JWT rejected', { error: String(error) });
    return null;
  }
}

/**
 * Require authentication guard
 *
 * Returns 401 if not authenticated
 * Use after the auth resolver in the middleware chain
 */
export const requireAuth: MiddlewareHandler<HonoEnv> = async (c, next) => {
  if (!c.get('userId')) {
    c.header('WWW-Authenticate', 'Bearer');
    return c.json(
      {
        error: {
          code: 'UNAUTHENTICATED',
          message: 'Authentication required',
        },
      },
      401,
    );
  }

  return next();
};

/**
 * The authenticated user id; only valid behind requireAuth.
 */
export function getUserId(c: Context<HonoEnv>): string {
  const userId = c.get('userId');
  if (!userId) {
    throw new HTTPException(401, { message: 'Authentication required' });
  }
  return userId;
}
