/**
 * Query Processing
 *
 * Turns the newest user message plus prior turns into a search query,
 * asks the search repository for evidence and cleans the results.
 * Retrieval is best-effort: a failed search yields no evidence.
 */

import stopwordList from '@/data/stopwords.json';
import { RetrievalError, describeError } from '@/errors';
import type { SearchRepository, SearchResult } from '@/repositories/search/types';
import type { MessageRole } from '@/types/chat';
import { logger as rootLogger, type Logger } from '@/utils/logger';
import { countWords, tokenize } from '@/utils/text';

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

export const MAX_CONTEXT_KEYWORDS = 8;
export const CONTEXT_USER_TURNS = 2;
export const BROAD_TOP_K = 10;
export const NARROW_TOP_K = 3;
export const LONG_MESSAGE_WORDS = 20;
export const MIN_RELEVANCE = 0.1;
export const DUPLICATE_PREFIX_WORDS = 20;
export const DUPLICATE_OVERLAP = 0.7;

const BROAD_TERMS = new Set(['all', 'every', 'list', 'everything']);

export interface HistoryTurn {
  role: MessageRole;
  content: string;
}

export interface ProcessedQuery {
  query: string;
  topK: number;
  evidence: SearchResult[];
  retrievalFailed: boolean;
}

export class QueryProcessor {
  private readonly log: Logger;

  constructor(
    private readonly search: SearchRepository,
    private readonly options: { defaultTopK: number },
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'query-processing' });
  }

  /**
   * `history` holds the turns before `message`, oldest first.
   */
  async process(message: string, history: HistoryTurn[]): Promise<ProcessedQuery> {
    const query = this.buildQuery(message, history);
    const topK = this.chooseTopK(message);

    try {
      const results = await this.search.search(query, topK);
      return { query, topK, evidence: filterEvidence(results), retrievalFailed: false };
    } catch (error) {
      if (!(error instanceof RetrievalError)) throw error;
      this.log.warn('Retrieval failed, continuing without evidence', {
        error: describeError(error),
      });
      return { query, topK, evidence: [], retrievalFailed: true };
    }
  }

  buildQuery(message: string, history: HistoryTurn[]): string {
    const base = message.trim();
    const present = new Set(tokenize(base));
    const keywords: string[] = [];

    const priorUserTurns = history.filter((turn) => turn.role === 'user').slice(-CONTEXT_USER_TURNS);
    for (const turn of priorUserTurns) {
      for (const word of tokenize(turn.content)) {
        if (keywords.length >= MAX_CONTEXT_KEYWORDS) break;
        if (STOPWORDS.has(word) || present.has(word)) continue;
        present.add(word);
        keywords.push(word);
      }
    }

    return keywords.length > 0 ? `${base} ${keywords.join(' ')}` : base;
  }

  chooseTopK(message: string): number {
    if (tokenize(message).some((word) => BROAD_TERMS.has(word))) return BROAD_TOP_K;
    if (countWords(message) > LONG_MESSAGE_WORDS) return NARROW_TOP_K;
    return this.options.defaultTopK;
  }
}

/**
 * Drops weak matches and near-duplicates, highest relevance first. Among
 * near-duplicates the better-scored result survives.
 */
export function filterEvidence(results: SearchResult[]): SearchResult[] {
  const ranked = results
    .filter((result) => result.relevanceScore >= MIN_RELEVANCE)
    .sort((a, b) => b.relevanceScore - a.relevanceScore);

  const kept: Array<{ result: SearchResult; prefix: Set<string> }> = [];
  for (const result of ranked) {
    const prefix = new Set(tokenize(result.content).slice(0, DUPLICATE_PREFIX_WORDS));
    if (kept.some((entry) => overlap(entry.prefix, prefix) > DUPLICATE_OVERLAP)) continue;
    kept.push({ result, prefix });
  }
  return kept.map((entry) => entry.result);
}

function overlap(a: Set<string>, b: Set<string>): number {
  const smaller = Math.min(a.size, b.size);
  if (smaller === 0) return 0;
  let shared = 0;
  for (const word of a) {
    if (b.has(word)) shared += 1;
  }
  return shared / smaller;
}
