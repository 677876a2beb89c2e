import { createChildLogger } from '@prism/shared/src/logger.js';
import type { WebSearchClient, WebSearchOptions, WebSearchResult } from './types.js';

const log = createChildLogger('web-search:mock');

export interface MockWebSearchResponse {
  readonly content: string;
  readonly sourceUrls: readonly string[];
}

/** Keyed by a lowercase keyword; the first key contained in the query wins. */
export type MockWebSearchResponses = Readonly<Record<string, MockWebSearchResponse>>;

export interface MockWebSearchClient extends WebSearchClient {
  /** Queries received so far, in call order. */
  readonly queries: readonly string[];
}

const FALLBACK_RESPONSE: MockWebSearchResponse = {
  content: 'Mock web search result with general information about the topic.',
  sourceUrls: ['https://example.com/source1', 'https://example.com/source2'],
};

export function createMockWebSearchClient(
  responses: MockWebSearchResponses = {},
): MockWebSearchClient {
  log.info({ keywords: Object.keys(responses) }, 'Using mock web search client');

  const queries: string[] = [];

  function pick(query: string): MockWebSearchResponse {
    const lower = query.toLowerCase();
    const keyword = Object.keys(responses).find((key) => lower.includes(key.toLowerCase()));
    return keyword === undefined ? FALLBACK_RESPONSE : responses[keyword];
  }

  return {
    queries,

    search(query: string, options?: WebSearchOptions): Promise<WebSearchResult> {
      queries.push(query);
      const response = pick(query);
      log.debug({ query, sources: response.sourceUrls.length }, 'Mock web search');

      return Promise.resolve({
        query,
        content: response.content,
        sourceUrls: response.sourceUrls.slice(0, options?.maxResults),
      });
    },
  };
}
