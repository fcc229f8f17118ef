import { GroundworkValidationError } from '../errors.js';
import { GroundworkHttpClient } from '../http.js';
import type { ChatInput, ChatResult, ChatStreamEvent, ChatTurn } from '../types.js';
import {
  incompleteStream,
  streamError,
  toStageEvent,
  toUsage,
  type ErrorLine,
  type StageLine,
  type UsagePayload,
} from './stream.js';

interface ChatResponseEnvelope {
  message: { role: 'assistant'; content: string };
  session_id: string;
  message_id: string;
  user_message_id: string;
  context: {
    data_points: string[];
    thoughts: string;
    query: string;
    usage: UsagePayload;
    retrieval_failed: boolean;
  };
}

type ChatLine =
  | { type: 'session'; session_id: string; user_message_id: string; created: boolean }
  | StageLine
  | { type: 'complete'; message_id: string }
  | ({ type: 'result' } & ChatResponseEnvelope)
  | ErrorLine;

export async function chatMethod(
  http: GroundworkHttpClient,
  input: ChatInput,
): Promise<ChatResult> {
  const response = await http.request<ChatResponseEnvelope>({
    method: 'POST',
    path: '/chat',
    body: chatBody(input, false),
    signal: input.signal,
  });
  return toChatResult(response);
}

/**
 * Stage events as the server reaches them. A failure after the stream
 * opened is thrown as the same typed error a plain chat call would get.
 */
export async function* chatStreamMethod(
  http: GroundworkHttpClient,
  input: ChatInput,
): AsyncGenerator<ChatStreamEvent, void, undefined> {
  const lines = http.stream<ChatLine>({
    method: 'POST',
    path: '/chat',
    body: chatBody(input, true),
    signal: input.signal,
  });

  for await (const line of lines) {
    switch (line.type) {
      case 'session':
        yield {
          type: 'session',
          sessionId: line.session_id,
          userMessageId: line.user_message_id,
          created: line.created,
        };
        break;
      case 'retrieval':
      case 'generation':
        yield toStageEvent(line);
        break;
      case 'complete':
        yield { type: 'complete', messageId: line.message_id };
        break;
      case 'result':
        yield { type: 'result', result: toChatResult(line) };
        return;
      case 'error':
        throw streamError(line);
    }
  }
  throw incompleteStream('/chat');
}

function chatBody(input: ChatInput, stream: boolean) {
  return {
    messages: resolveMessages(input),
    ...(input.sessionId ? { session_id: input.sessionId } : {}),
    stream,
  };
}

function toChatResult(response: ChatResponseEnvelope): ChatResult {
  return {
    answer: response.message.content,
    sessionId: response.session_id,
    messageId: response.message_id,
    userMessageId: response.user_message_id,
    dataPoints: response.context.data_points,
    thoughts: response.context.thoughts,
    query: response.context.query,
    usage: toUsage(response.context.usage),
    retrievalFailed: response.context.retrieval_failed,
  };
}

function resolveMessages(input: ChatInput): ChatTurn[] {
  const messages =
    input.messages ?? (input.message !== undefined ? [{ role: 'user', content: input.message }] : []);

  const last = messages[messages.length - 1];
  if (!last || last.role !== 'user' || last.content.trim().length === 0) {
    throw new GroundworkValidationError('chat requires a non-empty final user message', {
      status: 400,
      code: 'INVALID_ARGS',
    });
  }
  return messages;
}
