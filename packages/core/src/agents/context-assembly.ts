import type { Modality, RetrievalHit } from '@prism/shared/src/types/retrieval.types.js';
import { createChildLogger } from '@prism/shared/src/logger.js';
import { assembleContext } from '../context/context-assembler.js';
import type { AssemblyOptions } from '../context/context-assembler.js';
import type { PipelineGraphState, PipelineNode } from '../orchestration/pipeline-state.js';

const log = createChildLogger('agent:context-assembly');

export function createContextAssemblyNode(options: AssemblyOptions): PipelineNode {
  return (state: PipelineGraphState): Promise<Partial<PipelineGraphState>> => {
    const retrieval: Partial<Record<Modality, readonly RetrievalHit[]>> = {};
    for (const outcome of state.retrieval ?? []) {
      if (outcome.status === 'ok') {
        retrieval[outcome.modality] = outcome.hits;
      } else {
        log.warn({ modality: outcome.modality, reason: outcome.reason }, 'Modality degraded');
      }
    }

    const bundle = assembleContext(
      {
        toolOutcome: state.toolOutcome ?? { status: 'none' },
        retrieval,
        history: state.history ?? [],
      },
      options,
    );

    log.info(
      {
        conversationId: state.query.conversationId,
        sections: bundle.sections.map((s) => s.label),
        images: bundle.images.length,
        length: bundle.text.length,
        droppedHits: bundle.droppedHits,
      },
      'Context assembled',
    );

    return Promise.resolve({ bundle });
  };
}
