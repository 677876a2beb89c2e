import { describe, it, expect, vi } from 'vitest';
import type { ContextBundle } from '@prism/shared/src/types/agent.types.js';
import { MalformedModelResponseError } from '@prism/shared/src/utils/errors.js';
import { createMockEmbeddingClient } from '../embedding/mock-embedding-client.js';
import { createInMemoryConversationRepository } from '../repositories/in-memory-conversation.repository.js';
import type { LlmResponse } from '../llm/llm-types.js';
import type { PipelineGraphState } from '../orchestration/pipeline-state.js';
import { createTurnRecorderNode, extractAnswerText } from './turn-recorder.js';

const bundle: ContextBundle = {
  sections: [],
  images: [],
  text: '',
  flags: { hasDocContext: true, hasImageContext: false, hasToolOutput: false },
  droppedHits: 0,
};

function stateWith(generation: LlmResponse): PipelineGraphState {
  return {
    query: {
      text: 'What is the tide?',
      conversationId: 'conv-1',
      userId: 'user-1',
      submittedAt: new Date('2026-03-01T09:00:00.000Z'),
    },
    planning: { kind: 'direct', text: '' },
    toolOutcome: { status: 'none' },
    retrieval: [],
    history: [],
    bundle,
    generation,
    answer: undefined,
  };
}

const answeredAt = new Date('2026-03-01T09:00:02.000Z');

describe('extractAnswerText', () => {
  it('should trim the answer text', () => {
    expect(extractAnswerText({ text: '  High tide at noon. \n', toolCalls: [] })).toBe(
      'High tide at noon.',
    );
  });

  it('should reject a response that only carries tool calls', () => {
    expect(() =>
      extractAnswerText({ text: '', toolCalls: [{ name: 'web_search', arguments: {} }] }),
    ).toThrow(MalformedModelResponseError);
  });
});

describe('createTurnRecorderNode', () => {
  it('should append the user turn, then the assistant turn', async () => {
    const repository = createInMemoryConversationRepository();
    const node = createTurnRecorderNode({
      conversationRepository: repository,
      fallbackAnswer: 'Fallback.',
      now: () => answeredAt,
    });

    const result = await node(stateWith({ text: 'High tide at noon.', toolCalls: [] }));

    expect(result.answer).toEqual({
      answer: 'High tide at noon.',
      conversationId: 'conv-1',
      metadata: {
        hasDocContext: true,
        hasImageContext: false,
        hasToolOutput: false,
        timestamp: '2026-03-01T09:00:02.000Z',
      },
    });
    const turns = await repository.list('conv-1');
    expect(turns.map((t) => [t.role, t.content, t.timestamp.toISOString()])).toEqual([
      ['user', 'What is the tide?', '2026-03-01T09:00:00.000Z'],
      ['assistant', 'High tide at noon.', '2026-03-01T09:00:02.000Z'],
    ]);
  });

  it('should store embeddings so the turns are searchable', async () => {
    const repository = createInMemoryConversationRepository();
    const embeddingClient = createMockEmbeddingClient(8);
    const node = createTurnRecorderNode({
      conversationRepository: repository,
      fallbackAnswer: 'Fallback.',
      embeddingClient,
      now: () => answeredAt,
    });

    await node(stateWith({ text: 'High tide at noon.', toolCalls: [] }));

    const [best] = await repository.searchSimilar({
      embedding: await embeddingClient.generateEmbedding('What is the tide?'),
      limit: 1,
    });
    expect(best.turn.content).toBe('What is the tide?');
    expect(best.score).toBeCloseTo(1, 6);
  });

  it('should append without embeddings when embedding fails', async () => {
    const repository = createInMemoryConversationRepository();
    const node = createTurnRecorderNode({
      conversationRepository: repository,
      fallbackAnswer: 'Fallback.',
      embeddingClient: {
        dimension: 8,
        generateEmbedding: vi.fn().mockRejectedValue(new Error('quota')),
        generateEmbeddings: vi.fn().mockRejectedValue(new Error('quota')),
      },
    });

    await node(stateWith({ text: 'High tide at noon.', toolCalls: [] }));

    expect(await repository.list('conv-1')).toHaveLength(2);
  });
});
