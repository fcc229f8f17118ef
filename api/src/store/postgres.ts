/**
 * PostgreSQL MessageStore
 *
 * Sequence allocation: the append transaction bumps
 * chat_sessions.message_count with UPDATE ... RETURNING, which takes the
 * session row lock, then inserts the message under the returned number.
 * Concurrent appends to one session serialise on that lock; appends to
 * different sessions never contend.
 */

import { randomUUID } from 'node:crypto';
import { and, asc, desc, eq, sql } from 'drizzle-orm';
import type { DatabaseHandle } from '@/db/client';
import { chatMessages, chatSessions, type ChatMessageRow, type ChatSessionRow } from '@/db/schema';
import { NotFoundError, PersistenceError, ValidationError, describeError, isAppError } from '@/errors';
import type { Message, MessageRole, Page, Session, VoteInput } from '@/types/chat';
import { logger } from '@/utils/logger';
import type { ListSessionsOptions, MessageStore } from './types';
import { assertAppendable, assertVote, deriveTitle, resolveVoteFields } from './validation';

export function toSession(row: ChatSessionRow): Session {
  return {
    sessionId: row.id,
    userId: row.userId,
    title: row.title,
    messageCount: row.messageCount,
    isActive: row.isActive,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function toMessage(row: ChatMessageRow): Message {
  return {
    messageId: row.id,
    sessionId: row.sessionId,
    userId: row.userId,
    sequence: row.sequence,
    role: row.role,
    content: row.content,
    upvote: row.upvote,
    downvote: row.downvote,
    feedback: row.feedback,
    votedAt: row.votedAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export interface PostgresMessageStoreOptions {
  now?: () => Date;
}

export class PostgresMessageStore implements MessageStore {
  readonly kind = 'postgres' as const;

  private readonly now: () => Date;

  constructor(
    private readonly handle: DatabaseHandle,
    options: PostgresMessageStoreOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  private get db() {
    return this.handle.db;
  }

  async createSession(userId: string): Promise<Session> {
    return this.run('createSession', async () => {
      const now = this.now();
      const [row] = await this.db
        .insert(chatSessions)
        .values({ id: randomUUID(), userId, createdAt: now, updatedAt: now })
        .returning();
      if (!row) {
        throw new PersistenceError('Session insert returned no row');
      }
      return toSession(row);
    });
  }

  async findSession(sessionId: string, userId: string): Promise<Session | null> {
    return this.run('findSession', async () => {
      const [row] = await this.db
        .select()
        .from(chatSessions)
        .where(and(eq(chatSessions.id, sessionId), eq(chatSessions.userId, userId)))
        .limit(1);
      return row ? toSession(row) : null;
    });
  }

  async listSessions(userId: string, options: ListSessionsOptions = {}): Promise<Session[]> {
    return this.run('listSessions', async () => {
      const filter = options.includeClosed
        ? eq(chatSessions.userId, userId)
        : and(eq(chatSessions.userId, userId), eq(chatSessions.isActive, true));

      let query = this.db
        .select()
        .from(chatSessions)
        .where(filter)
        .orderBy(desc(chatSessions.updatedAt), desc(chatSessions.createdAt))
        .$dynamic();
      if (options.limit !== undefined) query = query.limit(options.limit);
      if (options.offset !== undefined) query = query.offset(options.offset);

      const rows = await query;
      return rows.map(toSession);
    });
  }

  async closeSession(sessionId: string, userId: string): Promise<Session> {
    return this.run('closeSession', async () => {
      const [row] = await this.db
        .update(chatSessions)
        .set({ isActive: false, updatedAt: this.now() })
        .where(and(eq(chatSessions.id, sessionId), eq(chatSessions.userId, userId)))
        .returning();
      if (!row) {
        throw new NotFoundError('session');
      }
      return toSession(row);
    });
  }

  async deleteSession(sessionId: string, userId: string): Promise<void> {
    await this.run('deleteSession', () =>
      this.db.transaction(async (tx) => {
        await tx
          .delete(chatMessages)
          .where(and(eq(chatMessages.sessionId, sessionId), eq(chatMessages.userId, userId)));
        const deleted = await tx
          .delete(chatSessions)
          .where(and(eq(chatSessions.id, sessionId), eq(chatSessions.userId, userId)))
          .returning({ id: chatSessions.id });
        if (deleted.length === 0) {
          // Rolls back the message delete as well
          throw new NotFoundError('session');
        }
      }),
    );
  }

  async appendMessage(
    sessionId: string,
    userId: string,
    role: MessageRole,
    content: string,
  ): Promise<Message> {
    assertAppendable(role, content);

    return this.run('appendMessage', () =>
      this.db.transaction(async (tx) => {
        const now = this.now();
        const [session] = await tx
          .update(chatSessions)
          .set({
            messageCount: sql`${chatSessions.messageCount} + 1`,
            updatedAt: now,
            ...(role === 'user'
              ? { title: sql`COALESCE(${chatSessions.title}, ${deriveTitle(content)})` }
              : {}),
          })
          .where(
            and(
              eq(chatSessions.id, sessionId),
              eq(chatSessions.userId, userId),
              eq(chatSessions.isActive, true),
            ),
          )
          .returning({ messageCount: chatSessions.messageCount });

        if (!session) {
          const [existing] = await tx
            .select({ isActive: chatSessions.isActive })
            .from(chatSessions)
            .where(and(eq(chatSessions.id, sessionId), eq(chatSessions.userId, userId)))
            .limit(1);
          if (existing && !existing.isActive) {
            throw new ValidationError('Session is closed', { code: 'SESSION_CLOSED' });
          }
          throw new NotFoundError('session');
        }

        const [row] = await tx
          .insert(chatMessages)
          .values({
            id: randomUUID(),
            sessionId,
            userId,
            sequence: session.messageCount,
            role,
            content,
            createdAt: now,
            updatedAt: now,
          })
          .returning();
        if (!row) {
          throw new PersistenceError('Message insert returned no row');
        }
        return toMessage(row);
      }),
    );
  }

  async getMessages(sessionId: string, userId: string, page: Page = {}): Promise<Message[]> {
    return this.run('getMessages', async () => {
      const session = await this.findSession(sessionId, userId);
      if (!session) {
        throw new NotFoundError('session');
      }

      let query = this.db
        .select()
        .from(chatMessages)
        .where(and(eq(chatMessages.userId, userId), eq(chatMessages.sessionId, sessionId)))
        .orderBy(asc(chatMessages.sequence))
        .$dynamic();
      if (page.limit !== undefined) query = query.limit(page.limit);
      if (page.offset !== undefined) query = query.offset(page.offset);

      const rows = await query;
      return rows.map(toMessage);
    });
  }

  async getMessage(messageId: string, userId: string): Promise<Message | null> {
    return this.run('getMessage', async () => {
      const [row] = await this.db
        .select()
        .from(chatMessages)
        .where(and(eq(chatMessages.id, messageId), eq(chatMessages.userId, userId)))
        .limit(1);
      return row ? toMessage(row) : null;
    });
  }

  async applyVote(messageId: string, userId: string, vote: VoteInput): Promise<Message> {
    assertVote(vote);

    return this.run('applyVote', async () => {
      const now = this.now();
      const [row] = await this.db
        .update(chatMessages)
        .set({ ...resolveVoteFields(vote, now), updatedAt: now })
        .where(and(eq(chatMessages.id, messageId), eq(chatMessages.userId, userId)))
        .returning();
      if (!row) {
        throw new NotFoundError('message');
      }
      return toMessage(row);
    });
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.db.execute(sql`SELECT 1`);
      return true;
    } catch (error) {
      logger.error('Database health check failed', { error: describeError(error) });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.handle.close();
  }

  /**
   * Domain errors pass through; anything else from the driver becomes a
   * PersistenceError with the driver message kept out of the client text.
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isAppError(error)) throw error;
      logger.error('Message store operation failed', { operation, error: describeError(error) });
      throw new PersistenceError(`Message store unavailable during ${operation}`, { cause: error });
    }
  }
}
