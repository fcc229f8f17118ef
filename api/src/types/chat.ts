/**
 * Chat domain types shared by the store, services and routes.
 */

export const MESSAGE_ROLES = ['user', 'assistant'] as const;

export type MessageRole = (typeof MESSAGE_ROLES)[number];

export type VoteFlag = 0 | 1;

export interface Session {
  sessionId: string;
  userId: string;
  title: string | null;
  /** Sequence high-water mark: number of messages ever appended */
  messageCount: number;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface Message {
  messageId: string;
  sessionId: string;
  userId: string;
  /** Strictly increasing per session, starting at 1 */
  sequence: number;
  role: MessageRole;
  content: string;
  upvote: VoteFlag;
  downvote: VoteFlag;
  feedback: string | null;
  votedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface VoteInput {
  upvote: VoteFlag;
  downvote: VoteFlag;
  feedback?: string | null;
}

export interface Page {
  limit?: number;
  offset?: number;
}

export function isMessageRole(value: unknown): value is MessageRole {
  return value === 'user' || value === 'assistant';
}
