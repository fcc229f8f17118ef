/**
 * Session Manager
 *
 * Resolves, lists, closes and deletes conversations for one user at a
 * time. All persistence goes through the MessageStore.
 */

import { NotFoundError } from '@/errors';
import type { MessageStore } from '@/store/types';
import type { Message, Page, Session } from '@/types/chat';

export const DEFAULT_SESSION_PAGE_SIZE = 20;
export const MAX_SESSION_PAGE_SIZE = 100;

export interface ListSessionsQuery {
  limit?: number;
  offset?: number;
  includeClosed?: boolean;
}

export class SessionManager {
  constructor(private readonly store: MessageStore) {}

  /**
   * A supplied id must already exist and belong to the caller; a new
   * session is created only when no id is given.
   */
  async getOrCreate(userId: string, sessionId?: string): Promise<Session> {
    if (sessionId === undefined) {
      return this.store.createSession(userId);
    }
    return this.getSession(sessionId, userId);
  }

  async getSession(sessionId: string, userId: string): Promise<Session> {
    const session = await this.store.findSession(sessionId, userId);
    if (!session) {
      throw new NotFoundError('session');
    }
    return session;
  }

  async listSessions(userId: string, query: ListSessionsQuery = {}): Promise<Session[]> {
    const limit = Math.min(Math.max(query.limit ?? DEFAULT_SESSION_PAGE_SIZE, 1), MAX_SESSION_PAGE_SIZE);
    const offset = Math.max(query.offset ?? 0, 0);
    return this.store.listSessions(userId, {
      limit,
      offset,
      includeClosed: query.includeClosed ?? false,
    });
  }

  async getHistory(sessionId: string, userId: string, page: Page = {}): Promise<Message[]> {
    return this.store.getMessages(sessionId, userId, page);
  }

  async closeSession(sessionId: string, userId: string): Promise<Session> {
    return this.store.closeSession(sessionId, userId);
  }

  async deleteSession(sessionId: string, userId: string): Promise<void> {
    await this.store.deleteSession(sessionId, userId);
  }
}
