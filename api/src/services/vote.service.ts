/**
 * Vote Subsystem
 *
 * Records thumbs up/down and free-text feedback on a message. Flags are
 * checked before the store is touched; the message must belong to both
 * the caller and the stated session.
 */

import { NotFoundError } from '@/errors';
import { assertVote } from '@/store/validation';
import type { MessageStore } from '@/store/types';
import type { Message, VoteFlag } from '@/types/chat';

export interface VoteRequest {
  userId: string;
  sessionId: string;
  messageId: string;
  upvote: VoteFlag;
  downvote: VoteFlag;
  feedback?: string | null;
}

export class VoteService {
  constructor(private readonly store: MessageStore) {}

  async vote(request: VoteRequest): Promise<Message> {
    const vote = { upvote: request.upvote, downvote: request.downvote, feedback: request.feedback };
    assertVote(vote);

    const message = await this.store.getMessage(request.messageId, request.userId);
    if (!message || message.sessionId !== request.sessionId) {
      throw new NotFoundError('message');
    }
    return this.store.applyVote(request.messageId, request.userId, vote);
  }
}
