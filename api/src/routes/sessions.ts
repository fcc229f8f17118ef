/**
 * Session Routes
 *
 * Create, fetch, list, history, close and delete for the caller's
 * conversations
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import { getUserId, requireAuth } from '@/middleware/auth';
import {
  DEFAULT_SESSION_PAGE_SIZE,
  type SessionManager,
} from '@/services/session.service';
import {
  listSessionsQuerySchema,
  messagesQuerySchema,
  rejectInvalid,
  sessionParamSchema,
} from '@/validators/chat';
import { serializeMessage, serializeSession } from './serializers';

export function createSessionRoutes(deps: { sessions: SessionManager }) {
  const sessions = new Hono<HonoEnv>();

  sessions.use('*', requireAuth);

  /**
   * GET /sessions
   *
   * Most recently updated first; closed sessions only with include_closed
   */
  sessions.get('/', zValidator('query', listSessionsQuerySchema, rejectInvalid), async (c) => {
    const userId = getUserId(c);
    const query = c.req.valid('query');
    const limit = query.limit ?? DEFAULT_SESSION_PAGE_SIZE;
    const offset = query.offset ?? 0;

    const list = await deps.sessions.listSessions(userId, {
      limit,
      offset,
      includeClosed: query.include_closed,
    });

    return c.json({
      data: list.map(serializeSession),
      meta: { limit, offset, count: list.length },
    });
  });

  /**
   * POST /sessions
   *
   * Starts an empty conversation; the first chat turn titles it
   */
  sessions.post('/', async (c) => {
    const session = await deps.sessions.getOrCreate(getUserId(c));
    c.get('logger').info('Session created', { sessionId: session.sessionId });
    return c.json({ data: serializeSession(session) }, 201);
  });

  /**
   * GET /sessions/:session_id
   */
  sessions.get('/:session_id', zValidator('param', sessionParamSchema, rejectInvalid), async (c) => {
    const { session_id } = c.req.valid('param');
    const session = await deps.sessions.getSession(session_id, getUserId(c));
    return c.json({ data: serializeSession(session) });
  });

  /**
   * GET /sessions/:session_id/messages
   */
  sessions.get(
    '/:session_id/messages',
    zValidator('param', sessionParamSchema, rejectInvalid),
    zValidator('query', messagesQuerySchema, rejectInvalid),
    async (c) => {
      const userId = getUserId(c);
      const { session_id } = c.req.valid('param');
      const query = c.req.valid('query');

      const messages = await deps.sessions.getHistory(session_id, userId, {
        limit: query.limit,
        offset: query.offset,
      });

      return c.json({
        data: messages.map(serializeMessage),
        meta: { session_id, offset: query.offset ?? 0, count: messages.length },
      });
    },
  );

  /**
   * POST /sessions/:session_id/close
   */
  sessions.post('/:session_id/close', zValidator('param', sessionParamSchema, rejectInvalid), async (c) => {
    const userId = getUserId(c);
    const { session_id } = c.req.valid('param');

    const session = await deps.sessions.closeSession(session_id, userId);
    return c.json({ data: serializeSession(session) });
  });

  /**
   * DELETE /sessions/:session_id
   *
   * Removes the session and every message in it
   */
  sessions.delete('/:session_id', zValidator('param', sessionParamSchema, rejectInvalid), async (c) => {
    const userId = getUserId(c);
    const { session_id } = c.req.valid('param');

    await deps.sessions.deleteSession(session_id, userId);
    c.get('logger').info('Session deleted', { sessionId: session_id });

    return c.json({ deleted: true, session_id });
  });

  return sessions;
}
