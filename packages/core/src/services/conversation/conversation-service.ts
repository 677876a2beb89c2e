import type {
  Conversation,
  ConversationSummary,
} from '@prism/shared/src/types/conversation.types.js';
import { createChildLogger } from '@prism/shared/src/logger.js';
import { ConversationNotFoundError } from '@prism/shared/src/utils/errors.js';
import type { ConversationRepository } from '../../repositories/conversation.repository.js';

const log = createChildLogger('service:conversation');

export interface ConversationService {
  /** Most recently active first. */
  list(userId?: string): Promise<readonly ConversationSummary[]>;
  get(conversationId: string): Promise<Conversation>;
  /** Idempotent; returns the number of turns removed. */
  delete(conversationId: string): Promise<number>;
}

export function createConversationService(repository: ConversationRepository): ConversationService {
  return {
    list(userId?: string): Promise<readonly ConversationSummary[]> {
      return repository.listConversations(userId);
    },

    async get(conversationId: string): Promise<Conversation> {
      const turns = await repository.list(conversationId);
      if (turns.length === 0) {
        throw new ConversationNotFoundError(conversationId);
      }
      return { conversationId, turns };
    },

    async delete(conversationId: string): Promise<number> {
      const removed = await repository.delete(conversationId);
      log.info({ conversationId, removed }, 'Conversation deleted');
      return removed;
    },
  };
}
