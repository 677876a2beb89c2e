import { z } from 'zod';
import type { WebSearchClient } from '../services/web-search/types.js';
import { defineTool } from './tool-registry.js';
import type { RegisteredTool } from './tool-registry.js';

export const WEB_SEARCH_TOOL = 'web_search';

const WebSearchArgsSchema = z.object({
  keywords: z.string().min(1).describe('Search keywords'),
  maxResults: z.number().int().min(1).max(10).optional().describe('Maximum number of sources'),
});

export interface WebSearchToolDeps {
  readonly client: WebSearchClient;
  readonly defaultMaxResults: number;
}

export function createWebSearchTool(deps: WebSearchToolDeps): RegisteredTool {
  return defineTool({
    name: WEB_SEARCH_TOOL,
    description:
      'Search the web for current information that is not in the ingested documents, images or videos.',
    argsSchema: WebSearchArgsSchema,

    async execute(args) {
      const maxResults = args.maxResults ?? deps.defaultMaxResults;
      const result = await deps.client.search(args.keywords, { maxResults });

      const lines = [result.content.trim()];
      if (result.sourceUrls.length > 0) {
        lines.push('Sources:', ...result.sourceUrls.map((url) => `- ${url}`));
      }

      return {
        toolName: WEB_SEARCH_TOOL,
        arguments: { keywords: args.keywords, maxResults },
        content: lines.join('\n'),
        data: result,
      };
    },
  });
}
