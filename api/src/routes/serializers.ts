/**
 * Domain objects to snake_case wire shapes.
 */

import type { GenerationUsage } from '@/repositories/generation/types';
import type { AskResult } from '@/services/ask.service';
import type { ChatEvent, ChatResult } from '@/services/chat.service';
import type { Message, Session } from '@/types/chat';

export function serializeSession(session: Session) {
  return {
    session_id: session.sessionId,
    title: session.title,
    message_count: session.messageCount,
    is_active: session.isActive,
    created_at: session.createdAt.toISOString(),
    updated_at: session.updatedAt.toISOString(),
  };
}

export function serializeMessage(message: Message) {
  return {
    message_id: message.messageId,
    session_id: message.sessionId,
    sequence: message.sequence,
    role: message.role,
    content: message.content,
    upvote: message.upvote,
    downvote: message.downvote,
    feedback: message.feedback,
    voted_at: message.votedAt ? message.votedAt.toISOString() : null,
    created_at: message.createdAt.toISOString(),
    updated_at: message.updatedAt.toISOString(),
  };
}

function serializeUsage(usage: GenerationUsage) {
  return {
    prompt_tokens: usage.promptTokens,
    completion_tokens: usage.completionTokens,
    total_tokens: usage.totalTokens,
    model: usage.model,
  };
}

export function serializeChatResult(result: ChatResult) {
  return {
    message: { role: 'assistant' as const, content: result.answer },
    session_id: result.sessionId,
    message_id: result.messageId,
    user_message_id: result.userMessageId,
    context: {
      data_points: result.context.dataPoints,
      thoughts: result.context.thoughts,
      query: result.context.query,
      usage: serializeUsage(result.context.usage),
      retrieval_failed: result.context.retrievalFailed,
    },
  };
}

export function serializeAskResult(result: AskResult) {
  return {
    user_query: result.query,
    chatbot_response: result.answer,
    context: {
      approach: result.context.approach,
      documents_found: result.context.documentsFound,
      search_query: result.context.searchQuery,
      usage: serializeUsage(result.context.usage),
      retrieval_failed: result.context.retrievalFailed,
    },
    sources: result.sources.map((source) => ({
      title: source.title,
      source: source.sourceReference,
      relevance_score: source.relevanceScore,
      excerpt: source.excerpt,
    })),
    count: result.count,
  };
}

export function serializeChatEvent(event: ChatEvent) {
  switch (event.stage) {
    case 'session':
      return {
        type: 'session',
        session_id: event.sessionId,
        user_message_id: event.userMessageId,
        created: event.created,
      };
    case 'retrieval':
      return {
        type: 'retrieval',
        query: event.query,
        evidence_count: event.evidenceCount,
        retrieval_failed: event.retrievalFailed,
      };
    case 'generation':
      return { type: 'generation', attempt: event.attempt, reduced_context: event.reducedContext };
    case 'complete':
      return { type: 'complete', message_id: event.messageId };
  }
}
