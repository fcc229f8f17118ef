/**
 * Ask Orchestrator
 *
 * Single-turn retrieve-then-read: one question, no session, nothing
 * persisted. Shares retrieval and generation with the chat pipeline.
 */

import { GenerationError, describeError } from '@/errors';
import type { GenerationUsage } from '@/repositories/generation/types';
import type { SearchResult } from '@/repositories/search/types';
import { logger as rootLogger, type Logger } from '@/utils/logger';
import type { ChatEvent } from './chat.service';
import type { QueryProcessor } from './queryProcessing.service';
import type { GeneratedResponse, ResponseGenerator } from './responseGeneration.service';

export const MAX_SOURCES = 5;
export const EXCERPT_MAX_LENGTH = 150;
/** A word break earlier than this share of the limit is ignored */
const EXCERPT_BREAK_RATIO = 0.8;

export type AskEvent = Extract<ChatEvent, { stage: 'retrieval' | 'generation' }>;

export type AskEventListener = (event: AskEvent) => void;

export interface AskRequest {
  query: string;
  /** Client counter, echoed back unchanged */
  count?: number;
}

export interface AskSource {
  title: string;
  sourceReference: string;
  relevanceScore: number;
  excerpt: string;
}

export interface AskResult {
  query: string;
  answer: string;
  sources: AskSource[];
  count: number;
  context: {
    approach: 'retrieve_then_read';
    documentsFound: number;
    searchQuery: string;
    usage: GenerationUsage;
    retrievalFailed: boolean;
  };
}

export class AskService {
  private readonly log: Logger;

  constructor(
    private readonly deps: {
      queryProcessor: QueryProcessor;
      responseGenerator: ResponseGenerator;
    },
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'ask' });
  }

  async ask(request: AskRequest, onEvent?: AskEventListener): Promise<AskResult> {
    const emit = onEvent ?? (() => undefined);

    const processed = await this.deps.queryProcessor.process(request.query, []);
    emit({
      stage: 'retrieval',
      query: processed.query,
      evidenceCount: processed.evidence.length,
      retrievalFailed: processed.retrievalFailed,
    });

    let generated: GeneratedResponse;
    try {
      generated = await this.deps.responseGenerator.generateWithRetry(
        { message: request.query, history: [], evidence: processed.evidence },
        {
          onAttempt: (attempt, reducedContext) => emit({ stage: 'generation', attempt, reducedContext }),
          onRetry: (error) =>
            this.log.warn('Generation failed, retrying with reduced context', { error: describeError(error) }),
        },
      );
    } catch (error) {
      if (!(error instanceof GenerationError)) throw error;
      this.log.error('Generation failed after retry', { error: describeError(error) });
      throw new GenerationError('Failed to generate a response', { cause: error });
    }

    return {
      query: request.query,
      answer: generated.answer,
      sources: formatSources(processed.evidence),
      count: request.count ?? 0,
      context: {
        approach: 'retrieve_then_read',
        documentsFound: processed.evidence.length,
        searchQuery: processed.query,
        usage: generated.usage,
        retrievalFailed: processed.retrievalFailed,
      },
    };
  }
}

export function formatSources(evidence: SearchResult[]): AskSource[] {
  return evidence.slice(0, MAX_SOURCES).map((result, idx) => ({
    title: result.title ?? `Document ${idx + 1}`,
    sourceReference: result.sourceReference,
    relevanceScore: result.relevanceScore,
    excerpt: createExcerpt(result.content),
  }));
}

/**
 * At most `maxLength` code points including the trailing "...". The cut
 * moves back to the last space when one falls in the final fifth.
 */
export function createExcerpt(content: string, maxLength = EXCERPT_MAX_LENGTH): string {
  const chars = Array.from(content);
  if (chars.length <= maxLength) return content;

  const limit = maxLength - 3;
  let head = chars.slice(0, limit);
  const lastSpace = head.lastIndexOf(' ');
  if (lastSpace > limit * EXCERPT_BREAK_RATIO) {
    head = head.slice(0, lastSpace);
  }
  return `${head.join('')}...`;
}
