import type {
  ContentModality,
  ImagePreview,
  Modality,
  SimilarityMetric,
} from '@prism/shared/src/types/retrieval.types.js';
import type { EmbeddingClient } from '../embedding/embedding-client.js';
import type { ContentRepository } from '../repositories/content.repository.js';
import type { ConversationRepository } from '../repositories/conversation.repository.js';

export interface IndexMatch {
  readonly sourceId: string;
  readonly score: number;
  readonly snippet?: string;
  readonly preview?: ImagePreview;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface IndexSearchResult {
  readonly metric: SimilarityMetric;
  readonly matches: readonly IndexMatch[];
}

/** A similarity index over one modality. Embeds the query text itself. */
export interface ContentIndex {
  readonly modality: Modality;
  search(queryText: string, k: number): Promise<IndexSearchResult>;
}

export interface ContentIndexDeps {
  readonly modality: ContentModality;
  readonly repository: ContentRepository;
  readonly embeddingClient: EmbeddingClient;
}

export function createContentIndex(deps: ContentIndexDeps): ContentIndex {
  return {
    modality: deps.modality,

    async search(queryText: string, k: number): Promise<IndexSearchResult> {
      const embedding = await deps.embeddingClient.generateEmbedding(queryText);
      const result = await deps.repository.searchSimilar({
        modality: deps.modality,
        embedding,
        limit: k,
      });

      return {
        metric: result.metric,
        matches: result.matches.map((match) => ({
          sourceId: match.id,
          score: match.score,
          snippet: match.snippet,
          preview: match.preview,
          metadata: match.metadata,
        })),
      };
    },
  };
}

export interface ChatMemoryIndexDeps {
  readonly conversationRepository: ConversationRepository;
  readonly embeddingClient: EmbeddingClient;
  readonly userId?: string;
}

/** Prior turns across conversations, searched by their stored embeddings. */
export function createChatMemoryIndex(deps: ChatMemoryIndexDeps): ContentIndex {
  return {
    modality: 'chat_memory',

    async search(queryText: string, k: number): Promise<IndexSearchResult> {
      const embedding = await deps.embeddingClient.generateEmbedding(queryText);
      const results = await deps.conversationRepository.searchSimilar({
        embedding,
        limit: k,
        userId: deps.userId,
      });

      return {
        metric: 'cosine_similarity',
        matches: results.map(({ turn, score }) => ({
          sourceId: turn.id,
          score,
          snippet: turn.content,
          metadata: {
            conversationId: turn.conversationId,
            role: turn.role,
            timestamp: turn.timestamp.toISOString(),
          },
        })),
      };
    },
  };
}
