import { GroundworkServerError, errorFromEnvelope } from '../errors.js';
import type { PipelineStageEvent, TokenUsage } from '../types.js';

export interface UsagePayload {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
  model: string;
}

export type StageLine =
  | { type: 'retrieval'; query: string; evidence_count: number; retrieval_failed: boolean }
  | { type: 'generation'; attempt: number; reduced_context: boolean };

/** Final line of a stream whose pipeline threw */
export interface ErrorLine {
  type: 'error';
  status: number;
  error: { code: string; message: string; details?: unknown };
}

export function toStageEvent(line: StageLine): PipelineStageEvent {
  if (line.type === 'retrieval') {
    return {
      type: 'retrieval',
      query: line.query,
      evidenceCount: line.evidence_count,
      retrievalFailed: line.retrieval_failed,
    };
  }
  return { type: 'generation', attempt: line.attempt, reducedContext: line.reduced_context };
}

export function toUsage(payload: UsagePayload): TokenUsage {
  return {
    promptTokens: payload.prompt_tokens,
    completionTokens: payload.completion_tokens,
    totalTokens: payload.total_tokens,
    model: payload.model,
  };
}

export function streamError(line: ErrorLine) {
  return errorFromEnvelope(line.status, line);
}

export function incompleteStream(path: string) {
  return new GroundworkServerError(`Stream from ${path} ended without a result`, {
    status: 502,
    code: 'INCOMPLETE_STREAM',
  });
}
