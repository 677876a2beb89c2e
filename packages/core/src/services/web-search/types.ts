export interface WebSearchOptions {
  readonly maxResults?: number;
}

export interface WebSearchClient {
  search(query: string, options?: WebSearchOptions): Promise<WebSearchResult>;
}

export interface WebSearchResult {
  readonly query: string;
  /** Grounded summary of what the search found. */
  readonly content: string;
  readonly sourceUrls: readonly string[];
}
