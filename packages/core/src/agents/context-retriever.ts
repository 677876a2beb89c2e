import type { ModalityRetrieval } from '@prism/shared/src/types/agent.types.js';
import { createChildLogger } from '@prism/shared/src/logger.js';
import type { ModalityRetrievalConfig } from '@prism/schemas/src/agent-config.schema.js';
import type { RetrievalFederator } from '../retrieval/federator.js';
import type { PipelineGraphState, PipelineNode } from '../orchestration/pipeline-state.js';

const log = createChildLogger('agent:context-retriever');

export interface ContextRetrieverDeps {
  readonly federator: RetrievalFederator;
  readonly modalities: readonly ModalityRetrievalConfig[];
}

/** Federates each configured modality on its own, with its own limit and threshold. */
export function createContextRetrieverNode(deps: ContextRetrieverDeps): PipelineNode {
  return async (state: PipelineGraphState): Promise<Partial<PipelineGraphState>> => {
    const retrieval = await Promise.all(
      deps.modalities.map(async ({ modality, limit, threshold }): Promise<ModalityRetrieval> => {
        const result = await deps.federator.federate(state.query.text, [modality], {
          limit,
          threshold,
        });
        if (result.status === 'unavailable') {
          return {
            modality,
            status: 'degraded',
            reason: result.failures.map((f) => f.reason).join('; '),
          };
        }
        return { modality, status: 'ok', hits: result.hits };
      }),
    );

    log.info(
      {
        conversationId: state.query.conversationId,
        hits: Object.fromEntries(
          retrieval.map((r) => [r.modality, r.status === 'ok' ? r.hits.length : r.status]),
        ),
      },
      'Retrieval complete',
    );

    return { retrieval };
  };
}
