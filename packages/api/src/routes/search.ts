import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { RetrievalHit } from '@prism/shared/src/types/retrieval.types.js';
import { roundTo } from '@prism/shared/src/utils/math.js';
import { createChildLogger } from '@prism/shared/src/logger.js';
import type { RetrievalFederator } from '@prism/core/src/retrieval/federator.js';
import { createRouter, type AppEnv } from '../types.js';
import { SearchRequestSchema } from '../schemas/requests.js';
import { ErrorResponseSchema, SearchResponseSchema } from '../schemas/responses.js';
import type { SearchResult } from '../schemas/responses.js';

const log = createChildLogger('api:search');

const SIMILARITY_DECIMALS = 3;

export interface SearchRouteDeps {
  readonly federator: RetrievalFederator;
}

const searchRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Search'],
  summary: 'Similarity search across documents, images, video frames and transcripts',
  request: {
    body: {
      content: {
        'application/json': {
          schema: SearchRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Ranked results across the requested modalities',
      content: {
        'application/json': {
          schema: SearchResponseSchema,
        },
      },
    },
    400: {
      description: 'Validation error',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
    503: {
      description: 'Every requested modality failed',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

function toSearchResult(hit: RetrievalHit): SearchResult {
  return {
    type: hit.modality,
    id: hit.sourceId,
    similarity: roundTo(hit.similarity, SIMILARITY_DECIMALS),
    ...(hit.snippet !== undefined ? { text: hit.snippet } : {}),
    ...(hit.preview ? { thumbnail: hit.preview.data } : {}),
    metadata: { ...hit.metadata },
  };
}

export function createSearchRoutes(deps: SearchRouteDeps): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(searchRoute, async (c) => {
    const body = c.req.valid('json');
    const result = await deps.federator.federate(body.query, body.types, {
      limit: body.limit,
      threshold: body.threshold,
    });

    if (result.status === 'unavailable') {
      log.warn({ failures: result.failures }, 'Search unavailable');
      return c.json(
        {
          error: 'Search is unavailable',
          code: 'SEARCH_UNAVAILABLE',
          requestId: c.get('requestId'),
          details: result.failures.map((f) => `${f.modality}: ${f.reason}`),
        },
        503,
      );
    }

    return c.json(
      {
        query: body.query,
        status: result.status,
        results: result.hits.map(toSearchResult),
      },
      200,
    );
  });

  return routes;
}
