import { createApp } from '../packages/api/src/app.js';
import { createTestAgentConfig } from '../packages/schemas/src/test-fixtures.js';
import { createMockLlmClient } from '../packages/core/src/llm/llm-client.js';
import { createMockEmbeddingClient } from '../packages/core/src/embedding/mock-embedding-client.js';
import { createMockWebSearchClient } from '../packages/core/src/services/web-search/mock-web-search-client.js';
import { createInMemoryContentRepository } from '../packages/core/src/repositories/in-memory-content.repository.js';
import { createInMemoryConversationRepository } from '../packages/core/src/repositories/in-memory-conversation.repository.js';
import { createAgentRuntime } from '../packages/core/src/orchestration/agent-runtime.js';

const runtime = createAgentRuntime({
  agentConfig: createTestAgentConfig(),
  llmClient: createMockLlmClient(),
  embeddingClient: createMockEmbeddingClient(),
  webSearchClient: createMockWebSearchClient(),
  contentRepository: createInMemoryContentRepository(),
  conversationRepository: createInMemoryConversationRepository(),
});

const app = createApp({ runtime, quiet: true });

const doc = app.getOpenAPI31Document({
  openapi: '3.1.0',
  info: {
    title: 'Prism API',
    version: '0.1.0',
    description: 'Conversational retrieval over documents, images and video',
  },
  servers: [{ url: 'http://localhost:3000', description: 'Local development' }],
});

process.stdout.write(JSON.stringify(doc, null, 2));
process.stdout.write('\n');
