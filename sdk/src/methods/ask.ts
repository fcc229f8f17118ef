import { GroundworkValidationError } from '../errors.js';
import { GroundworkHttpClient } from '../http.js';
import type { AskInput, AskResult, AskStreamEvent } from '../types.js';
import {
  incompleteStream,
  streamError,
  toStageEvent,
  toUsage,
  type ErrorLine,
  type StageLine,
  type UsagePayload,
} from './stream.js';

interface AskResponseEnvelope {
  user_query: string;
  chatbot_response: string;
  context: {
    approach: string;
    documents_found: number;
    search_query: string;
    usage: UsagePayload;
    retrieval_failed: boolean;
  };
  sources: Array<{ title: string; source: string; relevance_score: number; excerpt: string }>;
  count: number;
}

type AskLine = StageLine | ({ type: 'result' } & AskResponseEnvelope) | ErrorLine;

/**
 * One question without a session; nothing is stored server-side.
 */
export async function askMethod(http: GroundworkHttpClient, input: AskInput): Promise<AskResult> {
  const response = await http.request<AskResponseEnvelope>({
    method: 'POST',
    path: '/ask',
    body: askBody(input),
    signal: input.signal,
  });
  return toAskResult(response);
}

export async function* askStreamMethod(
  http: GroundworkHttpClient,
  input: AskInput,
): AsyncGenerator<AskStreamEvent, void, undefined> {
  const lines = http.stream<AskLine>({
    method: 'POST',
    path: '/ask/stream',
    body: askBody(input),
    signal: input.signal,
  });

  for await (const line of lines) {
    if (line.type === 'error') throw streamError(line);
    if (line.type === 'result') {
      yield { type: 'result', result: toAskResult(line) };
      return;
    }
    yield toStageEvent(line);
  }
  throw incompleteStream('/ask/stream');
}

function askBody(input: AskInput) {
  if (input.query.trim().length === 0) {
    throw new GroundworkValidationError('ask requires a non-empty query', {
      status: 400,
      code: 'INVALID_ARGS',
    });
  }
  return {
    user_query: input.query,
    ...(input.count !== undefined ? { count: input.count } : {}),
  };
}

function toAskResult(response: AskResponseEnvelope): AskResult {
  return {
    query: response.user_query,
    answer: response.chatbot_response,
    sources: response.sources.map((source) => ({
      title: source.title,
      source: source.source,
      relevanceScore: source.relevance_score,
      excerpt: source.excerpt,
    })),
    count: response.count,
    approach: response.context.approach,
    documentsFound: response.context.documents_found,
    searchQuery: response.context.search_query,
    usage: toUsage(response.context.usage),
    retrievalFailed: response.context.retrieval_failed,
  };
}
