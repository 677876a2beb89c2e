import { serve } from '@hono/node-server';
import { loadAgentConfig } from '@prism/schemas/src/config-loader.js';
import { createFirestoreClient } from '@prism/core/src/infrastructure/firestore-client.js';
import { createFirestoreContentRepository } from '@prism/core/src/infrastructure/firestore-content.repository.js';
import { createFirestoreConversationRepository } from '@prism/core/src/infrastructure/firestore-conversation.repository.js';
import { createInMemoryContentRepository } from '@prism/core/src/repositories/in-memory-content.repository.js';
import { createInMemoryConversationRepository } from '@prism/core/src/repositories/in-memory-conversation.repository.js';
import type { ContentRepository } from '@prism/core/src/repositories/content.repository.js';
import type { ConversationRepository } from '@prism/core/src/repositories/conversation.repository.js';
import { createLlmClient } from '@prism/core/src/llm/llm-client.js';
import { createVertexEmbeddingClient } from '@prism/core/src/embedding/vertex-embedding-client.js';
import { createMockEmbeddingClient } from '@prism/core/src/embedding/mock-embedding-client.js';
import { createWebSearchClient } from '@prism/core/src/services/web-search/web-search-client.js';
import { createMockWebSearchClient } from '@prism/core/src/services/web-search/mock-web-search-client.js';
import { createAgentRuntime } from '@prism/core/src/orchestration/agent-runtime.js';
import { createChildLogger } from '@prism/shared/src/logger.js';
import { ConfigurationError } from '@prism/shared/src/utils/errors.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

interface Stores {
  readonly contentRepository: ContentRepository;
  readonly conversationRepository: ConversationRepository;
}

function createStores(): Stores {
  const storage = process.env['PRISM_STORAGE'] ?? 'firestore';

  if (storage === 'memory') {
    return {
      contentRepository: createInMemoryContentRepository(),
      conversationRepository: createInMemoryConversationRepository(),
    };
  }
  if (storage === 'firestore') {
    const db = createFirestoreClient();
    return {
      contentRepository: createFirestoreContentRepository(db),
      conversationRepository: createFirestoreConversationRepository(db),
    };
  }
  throw new ConfigurationError(`Unknown PRISM_STORAGE: ${storage} (expected firestore or memory)`);
}

async function main(): Promise<void> {
  const port = parseInt(process.env['PORT'] ?? '3000', 10);
  const configDir = process.env['PRISM_CONFIG_DIR'] ?? 'config';
  const useMocks = process.env['PRISM_MOCK_LLM'] === 'true';

  const agentConfig = await loadAgentConfig(configDir);
  const llmClient = await createLlmClient({ model: agentConfig.model });

  const projectId = process.env['PRISM_GCP_PROJECT_ID'] ?? process.env['GCP_PROJECT_ID'] ?? '';
  const aiLocation = process.env['VERTEX_AI_LOCATION'] ?? 'europe-west1';

  const runtime = createAgentRuntime({
    agentConfig,
    llmClient,
    embeddingClient: useMocks ? createMockEmbeddingClient() : createVertexEmbeddingClient(),
    imageEmbeddingClient: useMocks
      ? undefined
      : createVertexEmbeddingClient({ kind: 'multimodal', dimension: 512 }),
    webSearchClient: useMocks
      ? createMockWebSearchClient()
      : createWebSearchClient({ projectId, location: aiLocation }),
    ...createStores(),
    defaultUserId: process.env['PRISM_DEFAULT_USER_ID'],
  });

  const corsOrigins = (process.env['PRISM_CORS_ORIGINS'] ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  const app = createApp({ runtime, corsOrigins });

  log.info({ port, configDir, mocks: useMocks }, 'Starting Prism API server');

  serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, 'Prism API server running');
  });
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});
