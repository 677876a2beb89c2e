import { describe, it, expect } from 'vitest';
import { createChatMemoryIndex, createContentIndex } from './content-index.js';
import { createInMemoryContentRepository } from '../repositories/in-memory-content.repository.js';
import { createInMemoryConversationRepository } from '../repositories/in-memory-conversation.repository.js';
import type { EmbeddingClient } from '../embedding/embedding-client.js';

function fixedEmbeddingClient(vectors: Record<string, number[]>): EmbeddingClient {
  return {
    dimension: 2,
    generateEmbedding: (text) => Promise.resolve(vectors[text] ?? [0, 0]),
    generateEmbeddings: (texts) => Promise.resolve(texts.map((t) => vectors[t] ?? [0, 0])),
  };
}

describe('createContentIndex', () => {
  it('should embed the query and search its own modality', async () => {
    const repository = createInMemoryContentRepository();
    await repository.add({ id: 'd1', modality: 'document', embedding: [1, 0], snippet: 'quay walls', metadata: { page: 3 } });
    await repository.add({ id: 'i1', modality: 'image', embedding: [1, 0], metadata: {} });

    const index = createContentIndex({
      modality: 'document',
      repository,
      embeddingClient: fixedEmbeddingClient({ quay: [1, 0] }),
    });

    const result = await index.search('quay', 5);

    expect(result).toEqual({
      metric: 'cosine_similarity',
      matches: [{ sourceId: 'd1', score: 1, snippet: 'quay walls', preview: undefined, metadata: { page: 3 } }],
    });
  });
});

describe('createChatMemoryIndex', () => {
  it('should return prior turns with conversation provenance', async () => {
    const conversationRepository = createInMemoryConversationRepository();
    await conversationRepository.append({
      id: 'turn-1',
      conversationId: 'c1',
      role: 'user',
      content: 'Which bridge opened first?',
      userId: 'u1',
      timestamp: new Date('2024-03-01T10:00:00.000Z'),
      embedding: [0, 1],
    });

    const index = createChatMemoryIndex({
      conversationRepository,
      embeddingClient: fixedEmbeddingClient({ bridge: [0, 1] }),
    });

    const result = await index.search('bridge', 3);

    expect(index.modality).toBe('chat_memory');
    expect(result).toEqual({
      metric: 'cosine_similarity',
      matches: [
        {
          sourceId: 'turn-1',
          score: 1,
          snippet: 'Which bridge opened first?',
          metadata: { conversationId: 'c1', role: 'user', timestamp: '2024-03-01T10:00:00.000Z' },
        },
      ],
    });
  });
});
