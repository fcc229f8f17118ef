/**
 * Offline generation backend
 *
 * Echoes the highest-ranked evidence, or says nothing was found. Token
 * counts are word counts so usage stays meaningful in local runs.
 */

import type { SearchResult } from '@/repositories/search/types';
import { countWords } from '@/utils/text';
import { EVIDENCE_HEADING, type GenerationRepository, type GenerationResult, type Turn } from './types';

export const STAND_IN_MODEL = 'stand-in';

export class StandInGenerationRepository implements GenerationRepository {
  readonly name = 'stand-in-generation';

  async generate(turns: Turn[], evidence: SearchResult[]): Promise<GenerationResult> {
    const answer = evidence[0]
      ? `Based on ${evidence.length} source${evidence.length === 1 ? '' : 's'}: ${evidence[0].content} [${evidence[0].sourceReference}]`
      : `I could not find any information about "${lastUserText(turns)}".`;

    const promptTokens = turns.reduce((sum, turn) => sum + countWords(turn.content), 0);
    const completionTokens = countWords(answer);
    return {
      answer,
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: promptTokens + completionTokens,
        model: STAND_IN_MODEL,
      },
    };
  }
}

/**
 * The question without the evidence block appended to the final turn.
 */
function lastUserText(turns: Turn[]): string {
  for (let idx = turns.length - 1; idx >= 0; idx -= 1) {
    const turn = turns[idx];
    if (turn?.role === 'user') {
      return turn.content.split(`\n\n${EVIDENCE_HEADING}`)[0]?.trim() ?? '';
    }
  }
  return '';
}
