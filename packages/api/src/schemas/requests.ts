import { z } from '@hono/zod-openapi';
import { CONTENT_MODALITIES } from '@prism/shared/src/types/retrieval.types.js';

export const QueryRequestSchema = z
  .object({
    query: z.string().trim().min(1, 'Query text is required'),
    conversationId: z.string().min(1).optional(),
  })
  .openapi('QueryRequest');

export type QueryRequest = z.infer<typeof QueryRequestSchema>;

export const ConversationIdParamSchema = z.object({
  conversationId: z.string().min(1),
});

export const DEFAULT_SEARCH_LIMIT = 20;
export const DEFAULT_SEARCH_THRESHOLD = 0.3;

export const SearchRequestSchema = z
  .object({
    query: z.string().trim().min(1, 'Query text is required'),
    types: z.array(z.enum(CONTENT_MODALITIES)).min(1).default([...CONTENT_MODALITIES]),
    limit: z.number().int().min(1).max(100).default(DEFAULT_SEARCH_LIMIT),
    threshold: z.number().min(0).max(1).default(DEFAULT_SEARCH_THRESHOLD),
  })
  .openapi('SearchRequest');

export type SearchRequest = z.infer<typeof SearchRequestSchema>;
