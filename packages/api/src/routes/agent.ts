import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { Pipeline } from '@prism/core/src/orchestration/pipeline.js';
import type { ConversationService } from '@prism/core/src/services/conversation/conversation-service.js';
import { createRouter, type AppEnv } from '../types.js';
import { ConversationIdParamSchema, QueryRequestSchema } from '../schemas/requests.js';
import {
  AnswerResponseSchema,
  ConversationDetailResponseSchema,
  ConversationListResponseSchema,
  DeleteConversationResponseSchema,
  ErrorResponseSchema,
} from '../schemas/responses.js';

export interface AgentRouteDeps {
  readonly pipeline: Pipeline;
  readonly conversationService: ConversationService;
}

const queryRoute = createRoute({
  method: 'post',
  path: '/query',
  tags: ['Agent'],
  summary: 'Answer a query from retrieved context, tools and conversation history',
  request: {
    body: {
      content: {
        'application/json': {
          schema: QueryRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Generated answer',
      content: {
        'application/json': {
          schema: AnswerResponseSchema,
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
    502: {
      description: 'Model provider failure',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

const listConversationsRoute = createRoute({
  method: 'get',
  path: '/conversations',
  tags: ['Agent'],
  summary: 'List conversations, most recently active first',
  responses: {
    200: {
      description: 'Conversation summaries',
      content: {
        'application/json': {
          schema: ConversationListResponseSchema,
        },
      },
    },
  },
});

const getConversationRoute = createRoute({
  method: 'get',
  path: '/conversations/{conversationId}',
  tags: ['Agent'],
  summary: 'Get the messages of a conversation',
  request: {
    params: ConversationIdParamSchema,
  },
  responses: {
    200: {
      description: 'Conversation messages in order',
      content: {
        'application/json': {
          schema: ConversationDetailResponseSchema,
        },
      },
    },
    404: {
      description: 'Conversation not found',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

const deleteConversationRoute = createRoute({
  method: 'delete',
  path: '/conversations/{conversationId}',
  tags: ['Agent'],
  summary: 'Delete a conversation',
  request: {
    params: ConversationIdParamSchema,
  },
  responses: {
    200: {
      description: 'Conversation deleted',
      content: {
        'application/json': {
          schema: DeleteConversationResponseSchema,
        },
      },
    },
  },
});

export function createAgentRoutes(deps: AgentRouteDeps): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(queryRoute, async (c) => {
    const body = c.req.valid('json');
    const answer = await deps.pipeline.run({
      text: body.query,
      conversationId: body.conversationId,
    });

    return c.json(
      {
        answer: answer.answer,
        conversationId: answer.conversationId,
        metadata: { ...answer.metadata },
      },
      200,
    );
  });

  routes.openapi(listConversationsRoute, async (c) => {
    const summaries = await deps.conversationService.list();

    return c.json(
      summaries.map((s) => ({
        conversationId: s.conversationId,
        title: s.title,
        messageCount: s.turnCount,
        createdAt: s.createdAt.toISOString(),
        updatedAt: s.updatedAt.toISOString(),
      })),
      200,
    );
  });

  routes.openapi(getConversationRoute, async (c) => {
    const { conversationId } = c.req.valid('param');
    const conversation = await deps.conversationService.get(conversationId);

    return c.json(
      {
        conversationId,
        messages: conversation.turns.map((turn) => ({
          role: turn.role,
          content: turn.content,
          timestamp: turn.timestamp.toISOString(),
        })),
      },
      200,
    );
  });

  routes.openapi(deleteConversationRoute, async (c) => {
    const { conversationId } = c.req.valid('param');
    const numDeleted = await deps.conversationService.delete(conversationId);

    return c.json({ message: 'Deleted' as const, numDeleted }, 200);
  });

  return routes;
}
