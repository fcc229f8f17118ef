/**
 * Offline search backend
 *
 * Ranks a small fixed corpus by the share of unique query terms each
 * document contains. Deterministic and never throws.
 */

import corpus from '@/data/standInDocuments.json';
import { tokenize } from '@/utils/text';
import type { SearchRepository, SearchResult } from './types';

export interface StandInDocument {
  title: string;
  sourceReference: string;
  content: string;
}

interface IndexedDocument {
  document: StandInDocument;
  terms: Set<string>;
}

export class StandInSearchRepository implements SearchRepository {
  readonly name = 'stand-in-search';

  private readonly documents: IndexedDocument[];

  constructor(documents: StandInDocument[] = corpus) {
    this.documents = documents.map((document) => ({
      document,
      terms: new Set(tokenize(`${document.title} ${document.content}`)),
    }));
  }

  async search(query: string, topK: number): Promise<SearchResult[]> {
    const queryTerms = [...new Set(tokenize(query))];
    if (queryTerms.length === 0 || topK <= 0) return [];

    const scored = this.documents
      .map(({ document, terms }) => ({
        document,
        score: queryTerms.filter((term) => terms.has(term)).length / queryTerms.length,
      }))
      .filter((entry) => entry.score > 0);

    // Array.prototype.sort is stable: equal scores keep corpus order
    scored.sort((a, b) => b.score - a.score);

    return scored.slice(0, topK).map(({ document, score }) => ({
      content: document.content,
      sourceReference: document.sourceReference,
      relevanceScore: score,
      title: document.title,
    }));
  }
}
