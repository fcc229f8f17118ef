/**
 * Chat Orchestrator
 *
 * resolve session -> persist user message -> retrieve -> generate ->
 * persist assistant message. The user message is written before any
 * external call so it survives a failed generation; such a message stays
 * in history without an answer and is not retried automatically.
 */

import { GenerationError, describeError } from '@/errors';
import type { GenerationUsage } from '@/repositories/generation/types';
import type { SearchResult } from '@/repositories/search/types';
import type { MessageStore } from '@/store/types';
import type { Message } from '@/types/chat';
import { logger as rootLogger, type Logger } from '@/utils/logger';
import type { QueryProcessor } from './queryProcessing.service';
import {
  MAX_HISTORY_TURNS,
  type GeneratedResponse,
  type GenerationContext,
  type ResponseGenerator,
} from './responseGeneration.service';
import type { SessionManager } from './session.service';

export type ChatEvent =
  | { stage: 'session'; sessionId: string; userMessageId: string; created: boolean }
  | { stage: 'retrieval'; query: string; evidenceCount: number; retrievalFailed: boolean }
  | { stage: 'generation'; attempt: number; reducedContext: boolean }
  | { stage: 'complete'; messageId: string };

export type ChatEventListener = (event: ChatEvent) => void;

export interface ChatRequest {
  userId: string;
  message: string;
  sessionId?: string;
}

export interface ChatResult {
  answer: string;
  sessionId: string;
  messageId: string;
  userMessageId: string;
  context: {
    dataPoints: string[];
    thoughts: string;
    query: string;
    usage: GenerationUsage;
    retrievalFailed: boolean;
  };
}

export class ChatService {
  private readonly log: Logger;

  constructor(
    private readonly deps: {
      sessions: SessionManager;
      store: MessageStore;
      queryProcessor: QueryProcessor;
      responseGenerator: ResponseGenerator;
    },
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'chat' });
  }

  async chat(request: ChatRequest, onEvent?: ChatEventListener): Promise<ChatResult> {
    const { userId, message } = request;
    const emit = onEvent ?? (() => undefined);

    const session = await this.deps.sessions.getOrCreate(userId, request.sessionId);
    const userMessage = await this.deps.store.appendMessage(session.sessionId, userId, 'user', message);
    emit({
      stage: 'session',
      sessionId: session.sessionId,
      userMessageId: userMessage.messageId,
      created: request.sessionId === undefined,
    });

    const history = await this.loadHistory(userMessage);
    const processed = await this.deps.queryProcessor.process(message, history);
    emit({
      stage: 'retrieval',
      query: processed.query,
      evidenceCount: processed.evidence.length,
      retrievalFailed: processed.retrievalFailed,
    });

    const generated = await this.generateWithRetry(
      { message, history, evidence: processed.evidence },
      userMessage,
      emit,
    );

    const assistantMessage = await this.deps.store.appendMessage(
      session.sessionId,
      userId,
      'assistant',
      generated.answer,
    );
    emit({ stage: 'complete', messageId: assistantMessage.messageId });

    return {
      answer: generated.answer,
      sessionId: session.sessionId,
      messageId: assistantMessage.messageId,
      userMessageId: userMessage.messageId,
      context: {
        dataPoints: generated.provenance.map(toDataPoint),
        thoughts: describeThoughts(processed.query, generated.provenance, processed.retrievalFailed),
        query: processed.query,
        usage: generated.usage,
        retrievalFailed: processed.retrievalFailed,
      },
    };
  }

  /**
   * Turns strictly before the user message just written, so appends
   * racing on the same session never leak into this request's context.
   */
  private async loadHistory(userMessage: Message): Promise<Message[]> {
    const before = userMessage.sequence - 1;
    const messages = await this.deps.store.getMessages(userMessage.sessionId, userMessage.userId, {
      offset: Math.max(0, before - MAX_HISTORY_TURNS),
      limit: MAX_HISTORY_TURNS,
    });
    return messages.filter((m) => m.sequence < userMessage.sequence);
  }

  private async generateWithRetry(
    context: GenerationContext,
    userMessage: Message,
    emit: ChatEventListener,
  ): Promise<GeneratedResponse> {
    try {
      return await this.deps.responseGenerator.generateWithRetry(context, {
        onAttempt: (attempt, reducedContext) => emit({ stage: 'generation', attempt, reducedContext }),
        onRetry: (error) =>
          this.log.warn('Generation failed, retrying with reduced context', {
            sessionId: userMessage.sessionId,
            error: describeError(error),
          }),
      });
    } catch (error) {
      if (!(error instanceof GenerationError)) throw error;
      this.log.error('Generation failed after retry', {
        sessionId: userMessage.sessionId,
        userMessageId: userMessage.messageId,
        error: describeError(error),
      });
      throw new GenerationError('Failed to generate a response', {
        details: { session_id: userMessage.sessionId, user_message_id: userMessage.messageId },
        cause: error,
      });
    }
  }
}

function toDataPoint(result: SearchResult): string {
  return `${result.sourceReference}: ${result.content}`;
}

function describeThoughts(query: string, evidence: SearchResult[], retrievalFailed: boolean): string {
  const searched = `Searched for: ${query}`;
  if (retrievalFailed) return `${searched}\nSearch was unavailable; answered without sources.`;
  if (evidence.length === 0) return `${searched}\nNo relevant sources found.`;
  return `${searched}\nUsed ${evidence.length} source(s): ${evidence.map((e) => e.sourceReference).join(', ')}`;
}
