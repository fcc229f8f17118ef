import { describe, expect, it } from 'vitest';
import { GroundworkClient } from '../../src/client.js';
import { GroundworkServerError, GroundworkUpstreamError, GroundworkValidationError } from '../../src/errors.js';
import type { AskStreamEvent, ChatStreamEvent } from '../../src/types.js';
import {
  createFetchMock,
  jsonResponse,
  ndjsonLines,
  ndjsonResponse,
  parseJsonBody,
  requestHeaders,
} from '../fixtures/fetch.js';

const BASE_URL = 'https://chat.example.test';

function clientFor(fetchMock: typeof globalThis.fetch) {
  return new GroundworkClient({ token: 'test-token', baseUrl: BASE_URL, fetch: fetchMock });
}

async function collect<T>(events: AsyncIterable<T>): Promise<T[]> {
  const seen: T[] = [];
  for await (const event of events) seen.push(event);
  return seen;
}

const chatResult = {
  type: 'result',
  message: { role: 'assistant', content: 'Full-time staff receive 25 days.' },
  session_id: 'session-1',
  message_id: 'message-2',
  user_message_id: 'message-1',
  context: {
    data_points: ['leave-policy.md: Full-time staff receive 25 days.'],
    thoughts: 'Searched for: leave days\nUsed 1 source(s): leave-policy.md',
    query: 'leave days',
    usage: { prompt_tokens: 120, completion_tokens: 8, total_tokens: 128, model: 'test-model' },
    retrieval_failed: false,
  },
};

describe('chatStream', () => {
  it('requests NDJSON and maps every stage line', async () => {
    const { fetchMock, requests } = createFetchMock(() =>
      ndjsonResponse(
        ndjsonLines(
          { type: 'session', session_id: 'session-1', user_message_id: 'message-1', created: true },
          { type: 'retrieval', query: 'leave days', evidence_count: 1, retrieval_failed: false },
          { type: 'generation', attempt: 1, reduced_context: false },
          { type: 'complete', message_id: 'message-2' },
          chatResult,
        ),
      ),
    );

    const events = await collect(clientFor(fetchMock).chatStream({ message: 'leave days' }));

    expect(parseJsonBody(requests[0].init)).toEqual({
      messages: [{ role: 'user', content: 'leave days' }],
      stream: true,
    });
    expect(requestHeaders(requests[0]).get('accept')).toBe('application/x-ndjson');
    expect(events.slice(0, 4)).toEqual<ChatStreamEvent[]>([
      { type: 'session', sessionId: 'session-1', userMessageId: 'message-1', created: true },
      { type: 'retrieval', query: 'leave days', evidenceCount: 1, retrievalFailed: false },
      { type: 'generation', attempt: 1, reducedContext: false },
      { type: 'complete', messageId: 'message-2' },
    ]);
    const last = events[4];
    expect(last?.type).toBe('result');
    if (last?.type !== 'result') return;
    expect(last.result).toMatchObject({
      answer: 'Full-time staff receive 25 days.',
      sessionId: 'session-1',
      messageId: 'message-2',
      usage: { promptTokens: 120, completionTokens: 8, totalTokens: 128, model: 'test-model' },
    });
  });

  it('reassembles lines split across chunks', async () => {
    const text = ndjsonLines(
      { type: 'retrieval', query: 'q', evidence_count: 0, retrieval_failed: true },
      chatResult,
    ).join('');
    const { fetchMock } = createFetchMock(() => ndjsonResponse([text.slice(0, 10), text.slice(10, 95), text.slice(95)]));

    const events = await collect(clientFor(fetchMock).chatStream({ message: 'q' }));

    expect(events.map((event) => event.type)).toEqual(['retrieval', 'result']);
    expect(events[0]).toEqual({ type: 'retrieval', query: 'q', evidenceCount: 0, retrievalFailed: true });
  });

  it('throws the typed error carried by an error line', async () => {
    const { fetchMock } = createFetchMock(() =>
      ndjsonResponse(
        ndjsonLines(
          { type: 'session', session_id: 'session-1', user_message_id: 'message-1', created: false },
          {
            type: 'error',
            status: 502,
            error: {
              code: 'GENERATION_FAILED',
              message: 'Failed to generate a response',
              details: { session_id: 'session-1', user_message_id: 'message-1' },
            },
          },
        ),
      ),
    );
    const seen: string[] = [];

    const error = await (async () => {
      for await (const event of clientFor(fetchMock).chatStream({ message: 'hello', sessionId: 'session-1' })) {
        seen.push(event.type);
      }
    })().catch((caught: unknown) => caught);

    expect(seen).toEqual(['session']);
    expect(error).toBeInstanceOf(GroundworkUpstreamError);
    if (!(error instanceof GroundworkUpstreamError)) return;
    expect(error.code).toBe('GENERATION_FAILED');
    expect(error.details).toEqual({ session_id: 'session-1', user_message_id: 'message-1' });
  });

  it('fails when the stream ends without a result line', async () => {
    const { fetchMock } = createFetchMock(() =>
      ndjsonResponse(ndjsonLines({ type: 'generation', attempt: 1, reduced_context: false })),
    );

    await expect(collect(clientFor(fetchMock).chatStream({ message: 'hello' }))).rejects.toMatchObject({
      code: 'INCOMPLETE_STREAM',
      message: 'Stream from /chat ended without a result',
    });
  });

  it('rejects a line that is not JSON', async () => {
    const { fetchMock } = createFetchMock(() => ndjsonResponse(['{"type":"session"\n']));

    const error = await collect(clientFor(fetchMock).chatStream({ message: 'hello' })).catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(GroundworkServerError);
    if (!(error instanceof GroundworkServerError)) return;
    expect(error.code).toBe('INVALID_RESPONSE');
    expect(error.details).toEqual({ line: '{"type":"session"' });
  });

  it('maps a rejected request before the stream opens', async () => {
    const { fetchMock } = createFetchMock(() =>
      jsonResponse({ error: { code: 'VALIDATION_ERROR', message: 'Invalid request data' } }, 400),
    );

    await expect(collect(clientFor(fetchMock).chatStream({ message: 'hello' }))).rejects.toBeInstanceOf(
      GroundworkValidationError,
    );
  });

  it('validates the final turn before calling the API', async () => {
    const { fetchMock, requests } = createFetchMock(() => ndjsonResponse([]));

    await expect(
      collect(clientFor(fetchMock).chatStream({ messages: [{ role: 'assistant', content: 'hi' }] })),
    ).rejects.toThrow('chat requires a non-empty final user message');
    expect(requests).toHaveLength(0);
  });

  it('aborts the request when the consumer stops early', async () => {
    let signal: AbortSignal | undefined;
    const { fetchMock } = createFetchMock((request) => {
      signal = request.init?.signal ?? undefined;
      return ndjsonResponse(
        ndjsonLines(
          { type: 'session', session_id: 'session-1', user_message_id: 'message-1', created: true },
          chatResult,
        ),
      );
    });

    for await (const event of clientFor(fetchMock).chatStream({ message: 'hello' })) {
      expect(event.type).toBe('session');
      break;
    }

    expect(signal?.aborted).toBe(true);
  });
});

describe('askStream', () => {
  it('yields stage events and the mapped answer', async () => {
    const { fetchMock, requests } = createFetchMock(() =>
      ndjsonResponse(
        ndjsonLines(
          { type: 'retrieval', query: 'leave days', evidence_count: 1, retrieval_failed: false },
          { type: 'generation', attempt: 1, reduced_context: false },
          {
            type: 'result',
            user_query: 'leave days',
            chatbot_response: 'Full-time staff receive 25 days [1].',
            context: {
              approach: 'retrieve_then_read',
              documents_found: 1,
              search_query: 'leave days',
              usage: { prompt_tokens: 50, completion_tokens: 7, total_tokens: 57, model: 'test-model' },
              retrieval_failed: false,
            },
            sources: [
              { title: 'Annual leave policy', source: 'leave-policy.md', relevance_score: 1, excerpt: 'Full-time...' },
            ],
            count: 0,
          },
        ),
      ),
    );

    const events = await collect(clientFor(fetchMock).askStream({ query: 'leave days' }));

    expect(requests[0].url).toBe(`${BASE_URL}/ask/stream`);
    expect(parseJsonBody(requests[0].init)).toEqual({ user_query: 'leave days' });
    expect(events.slice(0, 2)).toEqual<AskStreamEvent[]>([
      { type: 'retrieval', query: 'leave days', evidenceCount: 1, retrievalFailed: false },
      { type: 'generation', attempt: 1, reducedContext: false },
    ]);
    const last = events[2];
    if (last?.type !== 'result') throw new Error('expected a result event');
    expect(last.result.answer).toBe('Full-time staff receive 25 days [1].');
    expect(last.result.sources).toEqual([
      { title: 'Annual leave policy', source: 'leave-policy.md', relevanceScore: 1, excerpt: 'Full-time...' },
    ]);
  });

  it('ends with the typed error from an error line', async () => {
    const { fetchMock } = createFetchMock(() =>
      ndjsonResponse(
        ndjsonLines(
          { type: 'retrieval', query: 'q', evidence_count: 0, retrieval_failed: false },
          { type: 'error', status: 502, error: { code: 'GENERATION_FAILED', message: 'Failed to generate a response' } },
        ),
      ),
    );

    await expect(collect(clientFor(fetchMock).askStream({ query: 'q' }))).rejects.toBeInstanceOf(
      GroundworkUpstreamError,
    );
  });
});
