/**
 * Groundwork Database Schema Definitions
 * Drizzle ORM schema for PostgreSQL
 *
 * Message-per-row storage: a session row holds metadata and the
 * per-session sequence high-water mark; every turn is its own row.
 * Kept in sync with sql/init.sql.
 */

import {
  pgTable,
  varchar,
  boolean,
  timestamp,
  integer,
  smallint,
  text,
  check,
  unique,
  index,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

/**
 * Conversation threads, one owner each
 */
export const chatSessions = pgTable(
  'chat_sessions',
  {
    id: varchar('id', { length: 64 }).primaryKey(),
    userId: varchar('user_id', { length: 128 }).notNull(),
    title: varchar('title', { length: 200 }),
    messageCount: integer('message_count').notNull().default(0),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    userIdx: index('idx_chat_sessions_user').on(table.userId),
    userActiveIdx: index('idx_chat_sessions_user_active').on(table.userId, table.isActive),
    updatedIdx: index('idx_chat_sessions_updated').on(table.updatedAt),
  })
);

/**
 * Individual turns with embedded vote fields
 */
export const chatMessages = pgTable(
  'chat_messages',
  {
    id: varchar('id', { length: 64 }).primaryKey(),
    sessionId: varchar('session_id', { length: 64 })
      .notNull()
      .references(() => chatSessions.id, { onDelete: 'cascade' }),
    userId: varchar('user_id', { length: 128 }).notNull(),
    sequence: integer('sequence').notNull(),
    role: varchar('role', { length: 16 }).notNull().$type<'user' | 'assistant'>(),
    content: text('content').notNull(),
    upvote: smallint('upvote').notNull().default(0).$type<0 | 1>(),
    downvote: smallint('downvote').notNull().default(0).$type<0 | 1>(),
    feedback: text('feedback'),
    votedAt: timestamp('voted_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    userIdx: index('idx_chat_messages_user').on(table.userId),
    sessionIdx: index('idx_chat_messages_session').on(table.sessionId),
    userSessionIdx: index('idx_chat_messages_user_session').on(table.userId, table.sessionId),
    createdIdx: index('idx_chat_messages_created').on(table.createdAt),
    votedIdx: index('idx_chat_messages_voted').on(table.votedAt),
    sequenceUnique: unique('chat_messages_session_sequence_unique').on(table.sessionId, table.sequence),
    roleCheck: check('chat_messages_role_check', sql`${table.role} IN ('user', 'assistant')`),
    voteCheck: check('chat_messages_vote_check', sql`NOT (${table.upvote} = 1 AND ${table.downvote} = 1)`),
  })
);

export type ChatSessionRow = typeof chatSessions.$inferSelect;
export type ChatMessageRow = typeof chatMessages.$inferSelect;
