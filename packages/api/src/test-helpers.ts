import type { OpenAPIHono } from '@hono/zod-openapi';
import type { AgentConfig } from '@prism/schemas/src/agent-config.schema.js';
import { createTestAgentConfig } from '@prism/schemas/src/test-fixtures.js';
import type { LlmClient } from '@prism/core/src/llm/llm-types.js';
import { createMockLlmClient } from '@prism/core/src/llm/llm-client.js';
import { createMockEmbeddingClient } from '@prism/core/src/embedding/mock-embedding-client.js';
import { createMockWebSearchClient } from '@prism/core/src/services/web-search/mock-web-search-client.js';
import { createInMemoryContentRepository } from '@prism/core/src/repositories/in-memory-content.repository.js';
import { createInMemoryConversationRepository } from '@prism/core/src/repositories/in-memory-conversation.repository.js';
import type { ContentRepository } from '@prism/core/src/repositories/content.repository.js';
import type { ConversationRepository } from '@prism/core/src/repositories/conversation.repository.js';
import type { EmbeddingClient } from '@prism/core/src/embedding/embedding-client.js';
import { createAgentRuntime } from '@prism/core/src/orchestration/agent-runtime.js';
import type { AgentRuntime } from '@prism/core/src/orchestration/agent-runtime.js';
import { createApp } from './app.js';
import type { AppEnv } from './types.js';

export const TEST_EMBEDDING_DIMENSION = 16;

export interface TestAppOptions {
  readonly agentConfig?: AgentConfig;
  readonly llmClient?: LlmClient;
  readonly embeddingClient?: EmbeddingClient;
  readonly contentRepository?: ContentRepository;
  readonly conversationRepository?: ConversationRepository;
  readonly now?: () => Date;
}

export interface TestApp {
  readonly app: OpenAPIHono<AppEnv>;
  readonly runtime: AgentRuntime;
  readonly embeddingClient: EmbeddingClient;
  readonly contentRepository: ContentRepository;
  readonly conversationRepository: ConversationRepository;
}

/**
 * Wires the full app against mock model clients and in-memory stores.
 * For use in unit tests only.
 */
export function createTestApp(options: TestAppOptions = {}): TestApp {
  const embeddingClient =
    options.embeddingClient ?? createMockEmbeddingClient(TEST_EMBEDDING_DIMENSION);
  const contentRepository = options.contentRepository ?? createInMemoryContentRepository();
  const conversationRepository =
    options.conversationRepository ?? createInMemoryConversationRepository();

  const runtime = createAgentRuntime({
    agentConfig: options.agentConfig ?? createTestAgentConfig(),
    llmClient: options.llmClient ?? createMockLlmClient(),
    embeddingClient,
    webSearchClient: createMockWebSearchClient(),
    contentRepository,
    conversationRepository,
    now: options.now,
    retryBaseDelayMs: 1,
  });

  const app = createApp({ runtime, quiet: true });

  return { app, runtime, embeddingClient, contentRepository, conversationRepository };
}
