/**
 * Ask Routes
 *
 * Stateless single-question answers: no session is read or written.
 * POST /ask/stream sends the same answer as NDJSON stage lines.
 */

import { Hono, type MiddlewareHandler } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import { requireAuth } from '@/middleware/auth';
import type { AskService } from '@/services/ask.service';
import { askRequestSchema, rejectInvalid } from '@/validators/chat';
import { streamNdjson } from './ndjson';
import { serializeAskResult, serializeChatEvent } from './serializers';

export function createAskRoutes(deps: {
  askService: AskService;
  rateLimit: MiddlewareHandler<HonoEnv>;
}) {
  const ask = new Hono<HonoEnv>();

  ask.use('*', requireAuth, deps.rateLimit);

  /**
   * POST /ask
   */
  ask.post('/', zValidator('json', askRequestSchema, rejectInvalid), async (c) => {
    const body = c.req.valid('json');
    const result = await deps.askService.ask({ query: body.user_query, count: body.count });
    return c.json(serializeAskResult(result));
  });

  /**
   * POST /ask/stream
   */
  ask.post('/stream', zValidator('json', askRequestSchema, rejectInvalid), async (c) => {
    const body = c.req.valid('json');
    return streamNdjson(c, {
      run: (send) =>
        deps.askService.ask({ query: body.user_query, count: body.count }, (event) =>
          send(serializeChatEvent(event)),
        ),
      result: serializeAskResult,
      failure: 'Streamed ask failed',
    });
  });

  return ask;
}
