import { randomUUID } from 'node:crypto';
import type {
  ConversationSummary,
  Turn,
  TurnSearchResult,
} from '@prism/shared/src/types/conversation.types.js';
import { cosineSimilarity } from '@prism/shared/src/utils/math.js';
import type {
  AppendTurnInput,
  ConversationRepository,
  SearchTurnsInput,
} from './conversation.repository.js';
import { compareSummaries, compareTurns, summarizeConversation } from './conversation.repository.js';

interface StoredTurn {
  readonly turn: Turn;
  readonly embedding?: readonly number[];
}

export function createInMemoryConversationRepository(): ConversationRepository {
  const conversations = new Map<string, Map<string, StoredTurn>>();

  function orderedTurns(conversationId: string): Turn[] {
    const stored = conversations.get(conversationId);
    if (!stored) {
      return [];
    }
    return [...stored.values()].map((s) => s.turn).sort(compareTurns);
  }

  return {
    append(input: AppendTurnInput): Promise<Turn> {
      const stored = conversations.get(input.conversationId) ?? new Map<string, StoredTurn>();
      const id = randomUUID();
      const maxSequence = Math.max(0, ...[...stored.values()].map((s) => s.turn.sequence));

      const turn: Turn = {
        id,
        conversationId: input.conversationId,
        sequence: maxSequence + 1,
        role: input.role,
        content: input.content,
        userId: input.userId,
        timestamp: input.timestamp ?? new Date(),
        metadata: input.metadata,
      };

      stored.set(id, { turn, embedding: input.embedding });
      conversations.set(input.conversationId, stored);
      return Promise.resolve(turn);
    },

    list(conversationId: string): Promise<readonly Turn[]> {
      return Promise.resolve(orderedTurns(conversationId));
    },

    listRecent(conversationId: string, n: number): Promise<readonly Turn[]> {
      if (n <= 0) {
        return Promise.resolve([]);
      }
      return Promise.resolve(orderedTurns(conversationId).slice(-n));
    },

    listConversations(userId?: string): Promise<readonly ConversationSummary[]> {
      const summaries = [...conversations.keys()]
        .map((conversationId) => ({ conversationId, turns: orderedTurns(conversationId) }))
        .filter(({ turns }) => turns.length > 0)
        .filter(({ turns }) => userId === undefined || turns.some((t) => t.userId === userId))
        .map(({ conversationId, turns }) => summarizeConversation(conversationId, turns))
        .sort(compareSummaries);
      return Promise.resolve(summaries);
    },

    delete(conversationId: string): Promise<number> {
      const count = conversations.get(conversationId)?.size ?? 0;
      conversations.delete(conversationId);
      return Promise.resolve(count);
    },

    searchSimilar(input: SearchTurnsInput): Promise<readonly TurnSearchResult[]> {
      const results: TurnSearchResult[] = [];
      for (const stored of conversations.values()) {
        for (const { turn, embedding } of stored.values()) {
          if (!embedding) continue;
          if (input.userId !== undefined && turn.userId !== input.userId) continue;
          results.push({ turn, score: cosineSimilarity(input.embedding, embedding) });
        }
      }
      results.sort((a, b) => b.score - a.score || a.turn.id.localeCompare(b.turn.id));
      return Promise.resolve(results.slice(0, input.limit));
    },
  };
}
