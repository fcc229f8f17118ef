import { GroundworkValidationError } from '../errors.js';
import { GroundworkHttpClient } from '../http.js';
import type { ChatMessage, VoteInput } from '../types.js';
import { toChatMessage, type MessagePayload } from './sessions.js';

export async function voteMethod(
  http: GroundworkHttpClient,
  input: VoteInput,
): Promise<ChatMessage> {
  if (input.upvote === 1 && input.downvote === 1) {
    throw new GroundworkValidationError('vote cannot set both upvote and downvote', {
      status: 400,
      code: 'INVALID_ARGS',
    });
  }

  const response = await http.request<{ data: MessagePayload }>({
    method: 'POST',
    path: '/vote',
    body: {
      session_id: input.sessionId,
      message_id: input.messageId,
      upvote: input.upvote,
      downvote: input.downvote,
      ...(input.feedback !== undefined ? { feedback: input.feedback } : {}),
    },
  });

  return toChatMessage(response.data);
}
