import { describe, it, expect } from 'vitest';
import { createMockWebSearchClient } from './mock-web-search-client.js';
import { createWebSearchClient, extractSourceUrls } from './web-search-client.js';

describe('MockWebSearchClient', () => {
  it('should return default response for unknown queries', async () => {
    const client = createMockWebSearchClient();
    const result = await client.search('test query');

    expect(result.query).toBe('test query');
    expect(result.content).toContain('Mock web search result');
    expect(result.sourceUrls).toHaveLength(2);
  });

  it('should answer from the first keyword contained in the query', async () => {
    const client = createMockWebSearchClient({
      weather: { content: 'Sunny in Lisbon', sourceUrls: ['https://weather.example.com'] },
      news: { content: 'Headlines', sourceUrls: [] },
    });

    const result = await client.search('Latest WEATHER news');

    expect(result.content).toBe('Sunny in Lisbon');
    expect(result.sourceUrls).toEqual(['https://weather.example.com']);
  });

  it('should record every query in call order', async () => {
    const client = createMockWebSearchClient();

    await client.search('first');
    await client.search('second');

    expect(client.queries).toEqual(['first', 'second']);
  });

  it('should cap source urls at maxResults', async () => {
    const client = createMockWebSearchClient();
    const result = await client.search('anything', { maxResults: 1 });

    expect(result.sourceUrls).toEqual(['https://example.com/source1']);
  });
});

describe('extractSourceUrls', () => {
  it('should collect unique grounding uris across candidates', () => {
    const urls = extractSourceUrls({
      candidates: [
        {
          groundingMetadata: {
            groundingChunks: [
              { web: { uri: 'https://a.example.com' } },
              { web: {} },
              { web: { uri: 'https://b.example.com' } },
            ],
          },
        },
        { groundingMetadata: { groundingChunks: [{ web: { uri: 'https://a.example.com' } }] } },
        {},
      ],
    });

    expect(urls).toEqual(['https://a.example.com', 'https://b.example.com']);
  });

  it('should return an empty list without candidates', () => {
    expect(extractSourceUrls({})).toEqual([]);
  });
});

describe('createWebSearchClient', () => {
  it('should require a project id', () => {
    expect(() => createWebSearchClient({ projectId: '', location: 'europe-west1' })).toThrow(
      'Project ID is required for WebSearchClient',
    );
  });
});
