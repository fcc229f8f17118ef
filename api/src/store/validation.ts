import { ValidationError } from '@/errors';
import { isMessageRole, type MessageRole, type VoteFlag, type VoteInput } from '@/types/chat';

export const TITLE_MAX_LENGTH = 50;
export const FEEDBACK_MAX_LENGTH = 2_000;

export function assertAppendable(role: unknown, content: unknown): asserts role is MessageRole {
  if (!isMessageRole(role)) {
    throw new ValidationError(`Invalid role: expected "user" or "assistant"`, {
      details: { field: 'role' },
    });
  }
  if (typeof content !== 'string' || content.trim().length === 0) {
    throw new ValidationError('Message content must not be empty', {
      details: { field: 'content' },
    });
  }
}

export function assertVote(vote: VoteInput): void {
  const flags: unknown[] = [vote.upvote, vote.downvote];
  if (!flags.every((flag) => flag === 0 || flag === 1)) {
    throw new ValidationError('upvote and downvote must each be 0 or 1', {
      details: { field: 'vote' },
    });
  }
  if (vote.upvote === 1 && vote.downvote === 1) {
    throw new ValidationError('upvote and downvote cannot both be 1', {
      details: { field: 'vote' },
    });
  }
  if (vote.feedback && vote.feedback.length > FEEDBACK_MAX_LENGTH) {
    throw new ValidationError(`feedback must be at most ${FEEDBACK_MAX_LENGTH} characters`, {
      details: { field: 'feedback' },
    });
  }
}

export interface VoteFields {
  upvote: VoteFlag;
  downvote: VoteFlag;
  feedback: string | null;
  votedAt: Date | null;
}

/**
 * 0/0 without feedback clears the vote; anything else counts as cast.
 */
export function resolveVoteFields(vote: VoteInput, now: Date): VoteFields {
  const feedback = vote.feedback?.trim() ? vote.feedback.trim() : null;
  const cast = vote.upvote === 1 || vote.downvote === 1 || feedback !== null;
  return {
    upvote: vote.upvote,
    downvote: vote.downvote,
    feedback,
    votedAt: cast ? now : null,
  };
}

/**
 * Length is counted in code points so a cut never splits a surrogate pair.
 */
export function deriveTitle(firstUserMessage: string): string {
  const title = firstUserMessage.trim().replace(/\s+/g, ' ');
  const chars = Array.from(title);
  if (chars.length > TITLE_MAX_LENGTH) {
    return `${chars.slice(0, TITLE_MAX_LENGTH - 3).join('')}...`;
  }
  return title;
}
