/**
 * Response Generation
 *
 * Frames the conversation for the generation repository: a system turn,
 * the most recent history, and a final user turn that carries the
 * numbered evidence block.
 */

import { GenerationError, describeError } from '@/errors';
import {
  EVIDENCE_HEADING,
  type GenerationRepository,
  type GenerationResult,
  type GenerationUsage,
  type Turn,
} from '@/repositories/generation/types';
import type { SearchResult } from '@/repositories/search/types';
import type { HistoryTurn } from './queryProcessing.service';

export const SYSTEM_PROMPT = [
  'You are an assistant that answers questions using only the numbered sources provided with the question.',
  'Cite the sources you use by their number in square brackets, for example [1].',
  'If the sources do not contain the answer, say that you do not know. Keep answers concise.',
].join(' ');

export const MAX_HISTORY_TURNS = 10;
export const REDUCED_HISTORY_TURNS = 2;
export const EVIDENCE_CONTENT_LIMIT = 500;

export interface GenerationContext {
  message: string;
  /** Turns before `message`, oldest first */
  history: HistoryTurn[];
  evidence: SearchResult[];
}

export interface GeneratedResponse {
  answer: string;
  usage: GenerationUsage;
  /** Evidence offered to the model, in the order it was numbered */
  provenance: SearchResult[];
}

export interface RetryHooks {
  /** Fires before each attempt */
  onAttempt?(attempt: number, reducedContext: boolean): void;
  /** Fires when the first attempt fails and the reduced retry follows */
  onRetry?(error: GenerationError): void;
}

export class ResponseGenerator {
  constructor(
    private readonly generation: GenerationRepository,
    private readonly options: { temperature: number },
  ) {}

  buildTurns(context: GenerationContext): Turn[] {
    const history = context.history.slice(-MAX_HISTORY_TURNS).map((turn) => ({
      role: turn.role,
      content: turn.content,
    }));
    return [
      { role: 'system', content: SYSTEM_PROMPT },
      ...history,
      { role: 'user', content: withEvidence(context.message, context.evidence) },
    ];
  }

  async generate(context: GenerationContext): Promise<GeneratedResponse> {
    const turns = this.buildTurns(context);

    let result: GenerationResult;
    try {
      result = await this.generation.generate(turns, context.evidence, this.options.temperature);
    } catch (error) {
      if (error instanceof GenerationError) throw error;
      throw new GenerationError(`Generation failed: ${describeError(error)}`, { cause: error });
    }

    if (!result.answer.trim()) {
      throw new GenerationError('Generation returned an empty answer');
    }

    return { answer: result.answer, usage: result.usage, provenance: context.evidence };
  }

  /**
   * One attempt on the full context, then a single retry on
   * reduceContext(context). The retry's GenerationError is rethrown.
   */
  async generateWithRetry(context: GenerationContext, hooks: RetryHooks = {}): Promise<GeneratedResponse> {
    hooks.onAttempt?.(1, false);
    try {
      return await this.generate(context);
    } catch (error) {
      if (!(error instanceof GenerationError)) throw error;
      hooks.onRetry?.(error);
    }

    hooks.onAttempt?.(2, true);
    return this.generate(reduceContext(context));
  }
}

/**
 * The smaller context used for the single retry after a generation
 * failure: half the evidence, rounded down, and the last two turns.
 */
export function reduceContext(context: GenerationContext): GenerationContext {
  return {
    message: context.message,
    history: context.history.slice(-REDUCED_HISTORY_TURNS),
    evidence: context.evidence.slice(0, Math.floor(context.evidence.length / 2)),
  };
}

export function formatEvidence(evidence: SearchResult[]): string {
  return evidence
    .map(
      (result, idx) =>
        `[${idx + 1}] ${result.sourceReference}: ${result.content.slice(0, EVIDENCE_CONTENT_LIMIT)}`,
    )
    .join('\n');
}

function withEvidence(message: string, evidence: SearchResult[]): string {
  if (evidence.length === 0) return message;
  return `${message}\n\n${EVIDENCE_HEADING}\n${formatEvidence(evidence)}`;
}
