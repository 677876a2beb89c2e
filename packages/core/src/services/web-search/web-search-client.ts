import { createChildLogger } from '@prism/shared/src/logger.js';
import { ConfigurationError, LlmError, toError } from '@prism/shared/src/utils/errors.js';
import type { WebSearchClient, WebSearchOptions, WebSearchResult } from './types.js';

const log = createChildLogger('web-search:client');

const DEFAULT_MAX_RESULTS = 5;

export interface WebSearchClientConfig {
  readonly projectId: string;
  readonly location: string;
  readonly model?: string;
}

interface GroundedResponse {
  readonly candidates?: readonly {
    readonly groundingMetadata?: {
      readonly groundingChunks?: readonly { readonly web?: { readonly uri?: string } }[];
    };
  }[];
}

export function extractSourceUrls(response: GroundedResponse): string[] {
  const urls: string[] = [];
  for (const candidate of response.candidates ?? []) {
    for (const chunk of candidate.groundingMetadata?.groundingChunks ?? []) {
      if (chunk.web?.uri) {
        urls.push(chunk.web.uri);
      }
    }
  }
  return [...new Set(urls)];
}

/**
 * Google-grounded search through Gemini. One request per call; the tool
 * layer decides what a failure means.
 */
export function createWebSearchClient(config: WebSearchClientConfig): WebSearchClient {
  const { projectId, location } = config;
  const model = config.model ?? 'gemini-2.0-flash';

  if (!projectId) {
    throw new ConfigurationError('Project ID is required for WebSearchClient');
  }

  log.info({ projectId, location, model }, 'Creating web search client');

  return {
    async search(query: string, options?: WebSearchOptions): Promise<WebSearchResult> {
      const maxResults = options?.maxResults ?? DEFAULT_MAX_RESULTS;
      log.debug({ query, maxResults }, 'Executing web search');

      const { GoogleGenAI } = await import('@google/genai');
      const client = new GoogleGenAI({ vertexai: true, project: projectId, location });

      try {
        const response = await client.models.generateContent({
          model,
          contents: `Search the web for the following keywords and summarize the top ${String(maxResults)} results, naming each source:\n${query}`,
          config: {
            tools: [{ googleSearch: {} }],
          },
        });

        const sourceUrls = extractSourceUrls(response).slice(0, maxResults);
        log.debug({ query, sourceCount: sourceUrls.length }, 'Web search completed');

        return { query, content: response.text ?? '', sourceUrls };
      } catch (error) {
        const cause = toError(error);
        throw new LlmError(`Web search failed: ${cause.message}`, false, cause);
      }
    },
  };
}
