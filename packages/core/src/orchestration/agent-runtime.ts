import { CONTENT_MODALITIES } from '@prism/shared/src/types/retrieval.types.js';
import type { AgentConfig } from '@prism/schemas/src/agent-config.schema.js';
import type { LlmClient } from '../llm/llm-types.js';
import type { EmbeddingClient } from '../embedding/embedding-client.js';
import type { ContentRepository } from '../repositories/content.repository.js';
import type { ConversationRepository } from '../repositories/conversation.repository.js';
import type { WebSearchClient } from '../services/web-search/types.js';
import { createChatMemoryIndex, createContentIndex } from '../retrieval/content-index.js';
import { createRetrievalFederator } from '../retrieval/federator.js';
import type { RetrievalFederator } from '../retrieval/federator.js';
import { createToolRegistry } from '../tools/tool-registry.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import { createWebSearchTool } from '../tools/web-search.tool.js';
import { createTranscriptSearchTool } from '../tools/transcript-search.tool.js';
import { createConversationService } from '../services/conversation/conversation-service.js';
import type { ConversationService } from '../services/conversation/conversation-service.js';
import { createPipeline, DEFAULT_USER_ID } from './pipeline.js';
import type { Pipeline } from './pipeline.js';

export interface AgentRuntimeDeps {
  readonly agentConfig: AgentConfig;
  readonly llmClient: LlmClient;
  /** Embeds query text for documents, transcripts and chat turns. */
  readonly embeddingClient: EmbeddingClient;
  /** Embeds query text into the image space; falls back to `embeddingClient`. */
  readonly imageEmbeddingClient?: EmbeddingClient;
  readonly webSearchClient: WebSearchClient;
  readonly contentRepository: ContentRepository;
  readonly conversationRepository: ConversationRepository;
  readonly defaultUserId?: string;
  readonly now?: () => Date;
  readonly retryBaseDelayMs?: number;
}

export interface AgentRuntime {
  readonly pipeline: Pipeline;
  readonly federator: RetrievalFederator;
  readonly toolRegistry: ToolRegistry;
  readonly conversationService: ConversationService;
}

export function createAgentRuntime(deps: AgentRuntimeDeps): AgentRuntime {
  const { agentConfig } = deps;
  const userId = deps.defaultUserId ?? DEFAULT_USER_ID;

  const federator = createRetrievalFederator({
    timeoutMs: agentConfig.timeouts.retrievalMs,
    indices: [
      ...CONTENT_MODALITIES.map((modality) =>
        createContentIndex({
          modality,
          repository: deps.contentRepository,
          embeddingClient:
            modality === 'image' || modality === 'video_frame'
              ? (deps.imageEmbeddingClient ?? deps.embeddingClient)
              : deps.embeddingClient,
        }),
      ),
      createChatMemoryIndex({
        conversationRepository: deps.conversationRepository,
        embeddingClient: deps.embeddingClient,
        userId,
      }),
    ],
  });

  const toolRegistry = createToolRegistry([
    createWebSearchTool({
      client: deps.webSearchClient,
      defaultMaxResults: agentConfig.tools.webSearch.maxResults,
    }),
    createTranscriptSearchTool({
      federator,
      limit: agentConfig.tools.transcriptSearch.limit,
      threshold: agentConfig.tools.transcriptSearch.threshold,
    }),
  ]);

  const pipeline = createPipeline({
    agentConfig,
    llmClient: deps.llmClient,
    toolRegistry,
    federator,
    conversationRepository: deps.conversationRepository,
    embeddingClient: deps.embeddingClient,
    defaultUserId: userId,
    now: deps.now,
    retryBaseDelayMs: deps.retryBaseDelayMs,
  });

  return {
    pipeline,
    federator,
    toolRegistry,
    conversationService: createConversationService(deps.conversationRepository),
  };
}
