/**
 * Chat Routes
 *
 * POST /chat answers the newest user message. With `stream: true` the
 * response is NDJSON: one line per pipeline stage, then a `result` or
 * `error` line.
 */

import { Hono, type MiddlewareHandler } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import { getUserId, requireAuth } from '@/middleware/auth';
import type { ChatService } from '@/services/chat.service';
import { chatRequestSchema, rejectInvalid } from '@/validators/chat';
import { streamNdjson } from './ndjson';
import { serializeChatEvent, serializeChatResult } from './serializers';

export function createChatRoutes(deps: {
  chatService: ChatService;
  rateLimit: MiddlewareHandler<HonoEnv>;
}) {
  const chat = new Hono<HonoEnv>();

  chat.post(
    '/',
    requireAuth,
    deps.rateLimit,
    zValidator('json', chatRequestSchema, rejectInvalid),
    async (c) => {
      const userId = getUserId(c);
      const body = c.req.valid('json');
      const last = body.messages[body.messages.length - 1];
      const request = {
        userId,
        // Validated: the last message exists and is a non-blank user turn
        message: last ? last.content : '',
        sessionId: body.session_id,
      };

      if (!body.stream) {
        const result = await deps.chatService.chat(request);
        return c.json(serializeChatResult(result));
      }

      return streamNdjson(c, {
        run: (send) => deps.chatService.chat(request, (event) => send(serializeChatEvent(event))),
        result: serializeChatResult,
        failure: 'Streamed chat failed',
      });
    },
  );

  return chat;
}
