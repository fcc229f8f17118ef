export interface SearchResult {
  content: string;
  sourceReference: string;
  /** Normalised to [0, 1] */
  relevanceScore: number;
  title?: string;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface SearchRepository {
  readonly name: string;
  search(query: string, topK: number, options?: CallOptions): Promise<SearchResult[]>;
}
