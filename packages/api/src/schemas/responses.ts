import { z } from '@hono/zod-openapi';
import { MODALITIES } from '@prism/shared/src/types/retrieval.types.js';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.literal('ok'),
    version: z.string(),
    startedAt: z.string().datetime(),
    uptimeSeconds: z.number().int().nonnegative(),
  })
  .openapi('HealthResponse');

// Agent
export const AnswerResponseSchema = z
  .object({
    answer: z.string(),
    conversationId: z.string(),
    metadata: z.object({
      timestamp: z.string(),
      hasDocContext: z.boolean(),
      hasImageContext: z.boolean(),
      hasToolOutput: z.boolean(),
    }),
  })
  .openapi('AnswerResponse');

export const ConversationSummarySchema = z
  .object({
    conversationId: z.string(),
    title: z.string(),
    messageCount: z.number(),
    createdAt: z.string(),
    updatedAt: z.string(),
  })
  .openapi('ConversationSummary');

export const ConversationListResponseSchema = z
  .array(ConversationSummarySchema)
  .openapi('ConversationListResponse');

export const ConversationDetailResponseSchema = z
  .object({
    conversationId: z.string(),
    messages: z.array(
      z.object({
        role: z.enum(['user', 'assistant']),
        content: z.string(),
        timestamp: z.string(),
      }),
    ),
  })
  .openapi('ConversationDetailResponse');

export const DeleteConversationResponseSchema = z
  .object({
    message: z.literal('Deleted'),
    numDeleted: z.number(),
  })
  .openapi('DeleteConversationResponse');

// Search
export const SearchResultSchema = z
  .object({
    type: z.enum(MODALITIES),
    id: z.string(),
    similarity: z.number(),
    text: z.string().optional(),
    thumbnail: z.string().optional(),
    metadata: z.record(z.unknown()),
  })
  .openapi('SearchResult');

export type SearchResult = z.infer<typeof SearchResultSchema>;

export const SearchResponseSchema = z
  .object({
    query: z.string(),
    status: z.enum(['complete', 'partial']),
    results: z.array(SearchResultSchema),
  })
  .openapi('SearchResponse');
