/**
 * Vote Routes
 *
 * POST /vote records feedback on one message of the caller's session
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import { getUserId, requireAuth } from '@/middleware/auth';
import type { VoteService } from '@/services/vote.service';
import { rejectInvalid, voteRequestSchema } from '@/validators/chat';
import { serializeMessage } from './serializers';

export function createVoteRoutes(deps: { voteService: VoteService }) {
  const vote = new Hono<HonoEnv>();

  vote.post('/', requireAuth, zValidator('json', voteRequestSchema, rejectInvalid), async (c) => {
    const userId = getUserId(c);
    const body = c.req.valid('json');

    const message = await deps.voteService.vote({
      userId,
      sessionId: body.session_id,
      messageId: body.message_id,
      upvote: body.upvote,
      downvote: body.downvote,
      feedback: body.feedback,
    });

    c.get('logger').info('Vote recorded', {
      messageId: message.messageId,
      upvote: message.upvote,
      downvote: message.downvote,
      cleared: message.votedAt === null,
    });

    return c.json({ data: serializeMessage(message) });
  });

  return vote;
}
