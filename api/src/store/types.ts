import type { Message, MessageRole, Page, Session, VoteInput } from '@/types/chat';

export interface ListSessionsOptions extends Page {
  includeClosed?: boolean;
}

/**
 * Sole writer of Session and Message records.
 *
 * Every query is scoped by user id. "Not found" and "not owned" raise the
 * same NotFoundError; driver failures raise PersistenceError.
 */
export interface MessageStore {
  readonly kind: 'postgres' | 'memory';

  createSession(userId: string): Promise<Session>;
  findSession(sessionId: string, userId: string): Promise<Session | null>;
  listSessions(userId: string, options?: ListSessionsOptions): Promise<Session[]>;
  closeSession(sessionId: string, userId: string): Promise<Session>;
  /** Removes the session and all of its messages in one step */
  deleteSession(sessionId: string, userId: string): Promise<void>;

  /**
   * Allocates the next per-session sequence number and inserts the message
   * atomically; bumps the session's updated_at and fills an empty title
   * from the first user message.
   */
  appendMessage(sessionId: string, userId: string, role: MessageRole, content: string): Promise<Message>;
  getMessages(sessionId: string, userId: string, page?: Page): Promise<Message[]>;
  getMessage(messageId: string, userId: string): Promise<Message | null>;
  applyVote(messageId: string, userId: string, vote: VoteInput): Promise<Message>;

  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
