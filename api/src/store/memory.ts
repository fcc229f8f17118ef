/**
 * In-process MessageStore
 *
 * Used when no DATABASE_URL is configured and by the test suites. Every
 * mutation runs synchronously between awaits, so sequence allocation and
 * insert happen in one step without a lock.
 */

import { randomUUID } from 'node:crypto';
import { NotFoundError, ValidationError } from '@/errors';
import type { Message, MessageRole, Page, Session, VoteInput } from '@/types/chat';
import type { ListSessionsOptions, MessageStore } from './types';
import { assertAppendable, assertVote, deriveTitle, resolveVoteFields } from './validation';

export interface MemoryMessageStoreOptions {
  now?: () => Date;
  generateId?: () => string;
}

export class MemoryMessageStore implements MessageStore {
  readonly kind = 'memory' as const;

  private readonly sessions = new Map<string, Session>();
  private readonly messages = new Map<string, Message[]>();
  private readonly messageIndex = new Map<string, string>();
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: MemoryMessageStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async createSession(userId: string): Promise<Session> {
    const now = this.now();
    const session: Session = {
      sessionId: this.generateId(),
      userId,
      title: null,
      messageCount: 0,
      isActive: true,
      createdAt: now,
      updatedAt: now,
    };
    this.sessions.set(session.sessionId, session);
    this.messages.set(session.sessionId, []);
    return { ...session };
  }

  async findSession(sessionId: string, userId: string): Promise<Session | null> {
    const session = this.owned(sessionId, userId);
    return session ? { ...session } : null;
  }

  async listSessions(userId: string, options: ListSessionsOptions = {}): Promise<Session[]> {
    const sessions = [...this.sessions.values()]
      .filter((s) => s.userId === userId && (options.includeClosed || s.isActive))
      .sort(
        (a, b) =>
          b.updatedAt.getTime() - a.updatedAt.getTime() ||
          b.createdAt.getTime() - a.createdAt.getTime(),
      );
    return paginate(sessions, options).map((s) => ({ ...s }));
  }

  async closeSession(sessionId: string, userId: string): Promise<Session> {
    const session = this.requireOwned(sessionId, userId);
    session.isActive = false;
    session.updatedAt = this.now();
    return { ...session };
  }

  async deleteSession(sessionId: string, userId: string): Promise<void> {
    this.requireOwned(sessionId, userId);
    for (const message of this.messages.get(sessionId) ?? []) {
      this.messageIndex.delete(message.messageId);
    }
    this.messages.delete(sessionId);
    this.sessions.delete(sessionId);
  }

  async appendMessage(
    sessionId: string,
    userId: string,
    role: MessageRole,
    content: string,
  ): Promise<Message> {
    assertAppendable(role, content);
    const session = this.requireOwned(sessionId, userId);
    if (!session.isActive) {
      throw new ValidationError('Session is closed', { code: 'SESSION_CLOSED' });
    }

    const now = this.now();
    session.messageCount += 1;
    session.updatedAt = now;
    if (session.title === null && role === 'user') {
      session.title = deriveTitle(content);
    }

    const message: Message = {
      messageId: this.generateId(),
      sessionId,
      userId,
      sequence: session.messageCount,
      role,
      content,
      upvote: 0,
      downvote: 0,
      feedback: null,
      votedAt: null,
      createdAt: now,
      updatedAt: now,
    };
    this.messages.get(sessionId)?.push(message);
    this.messageIndex.set(message.messageId, sessionId);
    return { ...message };
  }

  async getMessages(sessionId: string, userId: string, page: Page = {}): Promise<Message[]> {
    this.requireOwned(sessionId, userId);
    const messages = this.messages.get(sessionId) ?? [];
    return paginate(messages, page).map((m) => ({ ...m }));
  }

  async getMessage(messageId: string, userId: string): Promise<Message | null> {
    const message = this.ownedMessage(messageId, userId);
    return message ? { ...message } : null;
  }

  async applyVote(messageId: string, userId: string, vote: VoteInput): Promise<Message> {
    assertVote(vote);
    const message = this.ownedMessage(messageId, userId);
    if (!message) {
      throw new NotFoundError('message');
    }
    const now = this.now();
    Object.assign(message, resolveVoteFields(vote, now), { updatedAt: now });
    return { ...message };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.sessions.clear();
    this.messages.clear();
    this.messageIndex.clear();
  }

  private owned(sessionId: string, userId: string): Session | undefined {
    const session = this.sessions.get(sessionId);
    return session && session.userId === userId ? session : undefined;
  }

  private requireOwned(sessionId: string, userId: string): Session {
    const session = this.owned(sessionId, userId);
    if (!session) {
      throw new NotFoundError('session');
    }
    return session;
  }

  private ownedMessage(messageId: string, userId: string): Message | undefined {
    const sessionId = this.messageIndex.get(messageId);
    if (!sessionId) return undefined;
    const message = this.messages.get(sessionId)?.find((m) => m.messageId === messageId);
    return message && message.userId === userId ? message : undefined;
  }
}

function paginate<T>(items: T[], page: Page): T[] {
  const offset = page.offset ?? 0;
  return page.limit === undefined ? items.slice(offset) : items.slice(offset, offset + page.limit);
}
