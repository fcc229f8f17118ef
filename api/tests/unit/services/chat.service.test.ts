import { describe, it, expect, beforeEach } from 'vitest';
import { GenerationError, NotFoundError, RetrievalError } from '@/errors';
import type { SearchRepository } from '@/repositories/search/types';
import { ChatService, type ChatEvent } from '@/services/chat.service';
import { QueryProcessor } from '@/services/queryProcessing.service';
import { ResponseGenerator, SYSTEM_PROMPT } from '@/services/responseGeneration.service';
import { SessionManager } from '@/services/session.service';
import { MemoryMessageStore } from '@/store/memory';
import { createLogger } from '@/utils/logger';
import {
  answer,
  FixedSearchRepository,
  result,
  ScriptedGenerationRepository,
  ThrowingSearchRepository,
} from '../../helpers/repositories';

const log = createLogger({ test: 'chat' });

function build(search: SearchRepository, generation: ScriptedGenerationRepository) {
  const store = new MemoryMessageStore();
  const sessions = new SessionManager(store);
  const service = new ChatService(
    {
      sessions,
      store,
      queryProcessor: new QueryProcessor(search, { defaultTopK: 5 }, log),
      responseGenerator: new ResponseGenerator(generation, { temperature: 0.3 }),
    },
    log,
  );
  return { store, sessions, service };
}

describe('ChatService', () => {
  let events: ChatEvent[];
  const record = (event: ChatEvent) => {
    events.push(event);
  };

  beforeEach(() => {
    events = [];
  });

  it('answers a new conversation and persists both turns', async () => {
    const evidence = [result('Full-time staff get 25 days.', 0.9, 'leave.md')];
    const generation = new ScriptedGenerationRepository([answer('You get 25 days [1].')]);
    const { store, service } = build(new FixedSearchRepository(evidence), generation);

    const reply = await service.chat({ userId: 'user-a', message: 'How much annual leave?' }, record);

    const stored = await store.getMessages(reply.sessionId, 'user-a');
    expect(stored.map((m) => [m.sequence, m.role, m.content])).toEqual([
      [1, 'user', 'How much annual leave?'],
      [2, 'assistant', 'You get 25 days [1].'],
    ]);
    expect(reply.userMessageId).toBe(stored[0]?.messageId);
    expect(reply.messageId).toBe(stored[1]?.messageId);
    expect(reply.answer).toBe('You get 25 days [1].');
    expect(reply.context).toEqual({
      dataPoints: ['leave.md: Full-time staff get 25 days.'],
      thoughts: 'Searched for: How much annual leave?\nUsed 1 source(s): leave.md',
      query: 'How much annual leave?',
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15, model: 'test-model' },
      retrievalFailed: false,
    });
    expect(events.map((e) => e.stage)).toEqual(['session', 'retrieval', 'generation', 'complete']);
    expect(events[0]).toEqual({
      stage: 'session',
      sessionId: reply.sessionId,
      userMessageId: reply.userMessageId,
      created: true,
    });
  });

  it('continues an existing conversation with server-side history', async () => {
    const search = new FixedSearchRepository([]);
    const generation = new ScriptedGenerationRepository([answer('First answer.'), answer('Second answer.')]);
    const { service } = build(search, generation);

    const first = await service.chat({ userId: 'user-a', message: 'How much annual leave?' });
    const second = await service.chat({
      userId: 'user-a',
      message: 'And sick days?',
      sessionId: first.sessionId,
    });

    expect(second.sessionId).toBe(first.sessionId);
    expect(search.queries[1]).toEqual({ query: 'And sick days? much annual leave', topK: 5 });
    expect(generation.calls[1]?.turns).toEqual([
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: 'How much annual leave?' },
      { role: 'assistant', content: 'First answer.' },
      { role: 'user', content: 'And sick days?' },
    ]);
  });

  it('retries once with reduced context after a generation failure', async () => {
    const evidence = [result('alpha passage', 0.9, 'a.md'), result('bravo section', 0.8, 'b.md')];
    const generation = new ScriptedGenerationRepository([new Error('overloaded'), answer('Recovered.')]);
    const { service } = build(new FixedSearchRepository(evidence), generation);

    const reply = await service.chat({ userId: 'user-a', message: 'question' }, record);

    expect(reply.answer).toBe('Recovered.');
    expect(generation.calls[0]?.evidence).toEqual(evidence);
    expect(generation.calls[1]?.evidence).toEqual([evidence[0]]);
    expect(reply.context.dataPoints).toEqual(['a.md: alpha passage']);
    expect(events.filter((e) => e.stage === 'generation')).toEqual([
      { stage: 'generation', attempt: 1, reducedContext: false },
      { stage: 'generation', attempt: 2, reducedContext: true },
    ]);
  });

  it('surfaces GENERATION_FAILED with identifiers and keeps the user message', async () => {
    const generation = new ScriptedGenerationRepository([new Error('down'), new Error('still down')]);
    const { store, sessions, service } = build(new FixedSearchRepository([]), generation);

    const error = await service
      .chat({ userId: 'user-a', message: 'Anyone there?' })
      .then(() => null, (e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationError);
    if (!(error instanceof GenerationError)) return;
    expect(error.code).toBe('GENERATION_FAILED');
    expect(error.status).toBe(502);

    const [session] = await sessions.listSessions('user-a');
    const history = await store.getMessages(session?.sessionId ?? '', 'user-a');
    expect(history).toHaveLength(1);
    expect(error.details).toEqual({
      session_id: session?.sessionId,
      user_message_id: history[0]?.messageId,
    });
    expect(generation.calls).toHaveLength(2);
  });

  it('answers without evidence when retrieval fails', async () => {
    const generation = new ScriptedGenerationRepository([answer('Best effort.')]);
    const { service } = build(new ThrowingSearchRepository(new RetrievalError('offline')), generation);

    const reply = await service.chat({ userId: 'user-a', message: 'question' });

    expect(reply.context.retrievalFailed).toBe(true);
    expect(reply.context.dataPoints).toEqual([]);
    expect(reply.context.thoughts).toBe(
      'Searched for: question\nSearch was unavailable; answered without sources.',
    );
  });

  it('rejects an unknown session id without creating anything', async () => {
    const generation = new ScriptedGenerationRepository([]);
    const { sessions, service } = build(new FixedSearchRepository([]), generation);

    await expect(
      service.chat({ userId: 'user-a', message: 'hello', sessionId: 'no-such-session' }),
    ).rejects.toBeInstanceOf(NotFoundError);
    expect(await sessions.listSessions('user-a', { includeClosed: true })).toEqual([]);
    expect(generation.calls).toHaveLength(0);
  });

  it('does not let one user continue another user\'s session', async () => {
    const generation = new ScriptedGenerationRepository([answer('Mine.')]);
    const { service } = build(new FixedSearchRepository([]), generation);
    const mine = await service.chat({ userId: 'user-a', message: 'hello' });

    await expect(
      service.chat({ userId: 'user-b', message: 'hijack', sessionId: mine.sessionId }),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('refuses new messages in a closed session', async () => {
    const generation = new ScriptedGenerationRepository([answer('One.')]);
    const { sessions, service } = build(new FixedSearchRepository([]), generation);
    const first = await service.chat({ userId: 'user-a', message: 'hello' });
    await sessions.closeSession(first.sessionId, 'user-a');

    await expect(
      service.chat({ userId: 'user-a', message: 'again', sessionId: first.sessionId }),
    ).rejects.toMatchObject({ code: 'SESSION_CLOSED' });
  });
});
