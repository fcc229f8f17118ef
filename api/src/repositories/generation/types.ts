import type { CallOptions, SearchResult } from '@/repositories/search/types';
import type { MessageRole } from '@/types/chat';

export type TurnRole = 'system' | MessageRole;

export interface Turn {
  role: TurnRole;
  content: string;
}

export interface GenerationUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  model: string;
}

export interface GenerationResult {
  answer: string;
  usage: GenerationUsage;
}

export interface GenerationRepository {
  readonly name: string;
  generate(
    turns: Turn[],
    evidence: SearchResult[],
    temperature: number,
    options?: CallOptions,
  ): Promise<GenerationResult>;
}

/** Heading that separates the question from the evidence block in the final user turn */
export const EVIDENCE_HEADING = 'Sources:';
