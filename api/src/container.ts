/**
 * Composition root
 *
 * Builds the dependency graph once per process. Tests build their own
 * graph with a memory store and injected fetch.
 */

import type { AppConfig } from '@/config';
import { createDatabase } from '@/db/client';
import { createRepositories, type Repositories } from '@/repositories/factory';
import { AskService } from '@/services/ask.service';
import { ChatService } from '@/services/chat.service';
import { QueryProcessor } from '@/services/queryProcessing.service';
import { RateLimitService } from '@/services/rateLimit.service';
import { ResponseGenerator } from '@/services/responseGeneration.service';
import { SessionManager } from '@/services/session.service';
import { VoteService } from '@/services/vote.service';
import { MemoryMessageStore } from '@/store/memory';
import { PostgresMessageStore } from '@/store/postgres';
import type { MessageStore } from '@/store/types';
import { logger as rootLogger, type Logger } from '@/utils/logger';

export interface Container {
  config: AppConfig;
  logger: Logger;
  store: MessageStore;
  repositories: Repositories;
  sessions: SessionManager;
  chatService: ChatService;
  askService: AskService;
  voteService: VoteService;
  rateLimiter: RateLimitService;
}

export interface ContainerOverrides {
  store?: MessageStore;
  repositories?: Repositories;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

export function createMessageStore(config: AppConfig, log: Logger): MessageStore {
  if (!config.databaseUrl) {
    log.warn('DATABASE_URL not set, using in-memory message store');
    return new MemoryMessageStore();
  }
  return new PostgresMessageStore(
    createDatabase({
      url: config.databaseUrl,
      poolSize: config.dbPoolSize,
      ssl: config.env === 'production',
    }),
  );
}

export function createContainer(config: AppConfig, overrides: ContainerOverrides = {}): Container {
  const logger = overrides.logger ?? rootLogger;
  const store = overrides.store ?? createMessageStore(config, logger);
  const repositories =
    overrides.repositories ?? createRepositories(config, { fetchImpl: overrides.fetchImpl, logger });

  const sessions = new SessionManager(store);
  const queryProcessor = new QueryProcessor(repositories.search, { defaultTopK: config.search.topK }, logger);
  const responseGenerator = new ResponseGenerator(repositories.generation, {
    temperature: config.generation.temperature,
  });

  return {
    config,
    logger,
    store,
    repositories,
    sessions,
    chatService: new ChatService({ sessions, store, queryProcessor, responseGenerator }, logger),
    askService: new AskService({ queryProcessor, responseGenerator }, logger),
    voteService: new VoteService(store),
    rateLimiter: new RateLimitService(config.rateLimit.chatPerMinute),
  };
}
