import { describe, it, expect, vi } from 'vitest';
import type {
  FederationOptions,
  FederationResult,
  Modality,
  RetrievalHit,
} from '@prism/shared/src/types/retrieval.types.js';
import type { RetrievalFederator } from '../retrieval/federator.js';
import type { PipelineGraphState } from '../orchestration/pipeline-state.js';
import { createContextRetrieverNode } from './context-retriever.js';

const state: PipelineGraphState = {
  query: { text: 'crane', conversationId: 'c', userId: 'u', submittedAt: new Date(0) },
  planning: undefined,
  toolOutcome: undefined,
  retrieval: undefined,
  history: undefined,
  bundle: undefined,
  generation: undefined,
  answer: undefined,
};

describe('createContextRetrieverNode', () => {
  it('should federate each modality with its own limit and threshold', async () => {
    const hit: RetrievalHit = {
      modality: 'document',
      sourceId: 'doc-1',
      similarity: 0.9,
      snippet: 'Cranes load ships.',
      metadata: {},
    };
    const federate = vi.fn(
      (
        _query: string,
        modalities: readonly Modality[],
        _options?: FederationOptions,
      ): Promise<FederationResult> =>
        Promise.resolve(
          modalities[0] === 'document'
            ? { status: 'complete', hits: [hit], failures: [] }
            : {
                status: 'unavailable',
                hits: [],
                failures: [
                  {
                    kind: 'ModalityUnavailable',
                    modality: 'image',
                    reason: 'Retrieval for image timed out after 10ms',
                  },
                ],
              },
        ),
    );
    const federator: RetrievalFederator = { federate };
    const node = createContextRetrieverNode({
      federator,
      modalities: [
        { modality: 'document', limit: 20, threshold: 0.5 },
        { modality: 'image', limit: 5, threshold: 0.25 },
      ],
    });

    const result = await node(state);

    expect(federate).toHaveBeenCalledWith('crane', ['document'], { limit: 20, threshold: 0.5 });
    expect(federate).toHaveBeenCalledWith('crane', ['image'], { limit: 5, threshold: 0.25 });
    expect(result.retrieval).toEqual([
      { modality: 'document', status: 'ok', hits: [hit] },
      {
        modality: 'image',
        status: 'degraded',
        reason: 'Retrieval for image timed out after 10ms',
      },
    ]);
  });
});
