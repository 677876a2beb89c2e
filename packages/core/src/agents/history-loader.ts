import { createChildLogger } from '@prism/shared/src/logger.js';
import { toError } from '@prism/shared/src/utils/errors.js';
import type { ConversationRepository } from '../repositories/conversation.repository.js';
import type { PipelineGraphState, PipelineNode } from '../orchestration/pipeline-state.js';

const log = createChildLogger('agent:history-loader');

export interface HistoryLoaderDeps {
  readonly conversationRepository: ConversationRepository;
  readonly turns: number;
}

export function createHistoryLoaderNode(deps: HistoryLoaderDeps): PipelineNode {
  return async (state: PipelineGraphState): Promise<Partial<PipelineGraphState>> => {
    const { conversationId } = state.query;
    try {
      const turns = await deps.conversationRepository.listRecent(conversationId, deps.turns);
      return { history: turns.map((turn) => ({ role: turn.role, content: turn.content })) };
    } catch (error) {
      log.warn({ conversationId, error: toError(error).message }, 'History unavailable');
      return { history: [] };
    }
  };
}
