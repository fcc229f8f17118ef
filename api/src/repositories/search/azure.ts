/**
 * Azure AI Search backend
 *
 * POST {endpoint}/indexes/{index}/docs/search?api-version=... with the
 * admin or query key in the `api-key` header. Scores are normalised into
 * [0, 1]: the semantic reranker score (0-4) when present, otherwise the
 * BM25 score divided by the best score in the batch.
 */

import { z } from 'zod';
import type { SearchBackendConfig } from '@/config';
import { RetrievalError, describeError } from '@/errors';
import type { CallOptions, SearchRepository, SearchResult } from './types';

const RERANKER_MAX = 4;

const searchResponseSchema = z.object({
  value: z.array(
    z
      .object({
        '@search.score': z.number(),
        '@search.rerankerScore': z.number().nullish(),
      })
      .passthrough(),
  ),
});

type SearchDocument = z.infer<typeof searchResponseSchema>['value'][number];

export class AzureSearchRepository implements SearchRepository {
  readonly name = 'azure-search';

  private readonly url: string;
  private readonly apiKey: string;

  constructor(
    private readonly config: SearchBackendConfig,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {
    const { endpoint, apiKey, index } = config;
    if (!endpoint || !apiKey || !index) {
      throw new Error('Search backend requires SEARCH_ENDPOINT, SEARCH_API_KEY and SEARCH_INDEX');
    }
    const base = endpoint.replace(/\/+$/, '');
    this.url = `${base}/indexes/${encodeURIComponent(index)}/docs/search?api-version=${encodeURIComponent(config.apiVersion)}`;
    this.apiKey = apiKey;
  }

  async search(query: string, topK: number, options: CallOptions = {}): Promise<SearchResult[]> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'api-key': this.apiKey,
        },
        body: JSON.stringify({ search: query, top: topK }),
        signal: options.signal,
      });
    } catch (error) {
      throw new RetrievalError(`Search request failed: ${describeError(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new RetrievalError(`Search service responded with ${response.status}`);
    }

    const parsed = searchResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new RetrievalError('Search service returned a malformed response', { cause: parsed.error });
    }

    const documents = parsed.data.value;
    const maxScore = Math.max(0, ...documents.map((doc) => doc['@search.score']));
    return documents.slice(0, topK).map((doc) => this.toResult(doc, maxScore));
  }

  private toResult(doc: SearchDocument, maxScore: number): SearchResult {
    const content = doc[this.config.contentField];
    if (typeof content !== 'string') {
      throw new RetrievalError(`Search document is missing the "${this.config.contentField}" field`);
    }
    const source = doc[this.config.sourceField];
    const title = doc[this.config.titleField];
    const reranker = doc['@search.rerankerScore'];
    const raw =
      typeof reranker === 'number'
        ? reranker / RERANKER_MAX
        : maxScore > 0
          ? doc['@search.score'] / maxScore
          : 0;

    return {
      content,
      sourceReference: typeof source === 'string' ? source : 'unknown',
      relevanceScore: Math.min(1, Math.max(0, raw)),
      ...(typeof title === 'string' ? { title } : {}),
    };
  }
}
