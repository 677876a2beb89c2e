import type {
  ConversationSummary,
  Turn,
  TurnMetadata,
  TurnRole,
  TurnSearchResult,
} from '@prism/shared/src/types/conversation.types.js';

export const TITLE_MAX_LENGTH = 100;

/** Turn ids are assigned by the store; an appended turn is never rewritten. */
export interface AppendTurnInput {
  readonly conversationId: string;
  readonly role: TurnRole;
  readonly content: string;
  readonly userId: string;
  readonly timestamp?: Date;
  readonly metadata?: TurnMetadata;
  readonly embedding?: readonly number[];
}

export interface SearchTurnsInput {
  readonly embedding: readonly number[];
  readonly limit: number;
  readonly userId?: string;
}

export interface ConversationRepository {
  /** Creates the conversation on its first turn. */
  append(input: AppendTurnInput): Promise<Turn>;
  /** All turns, ordered by (timestamp, sequence). Unknown ids give an empty list. */
  list(conversationId: string): Promise<readonly Turn[]>;
  /** The last `n` turns, oldest first. */
  listRecent(conversationId: string, n: number): Promise<readonly Turn[]>;
  listConversations(userId?: string): Promise<readonly ConversationSummary[]>;
  /** Removes every turn atomically and returns how many were removed. */
  delete(conversationId: string): Promise<number>;
  searchSimilar(input: SearchTurnsInput): Promise<readonly TurnSearchResult[]>;
}

export function compareTurns(a: Turn, b: Turn): number {
  return a.timestamp.getTime() - b.timestamp.getTime() || a.sequence - b.sequence;
}

export function deriveTitle(turns: readonly Turn[]): string {
  const first = turns.find((t) => t.role === 'user') ?? turns[0];
  return first ? first.content.slice(0, TITLE_MAX_LENGTH) : '';
}

/** Expects `turns` already ordered and non-empty. */
export function summarizeConversation(
  conversationId: string,
  turns: readonly Turn[],
): ConversationSummary {
  return {
    conversationId,
    title: deriveTitle(turns),
    turnCount: turns.length,
    createdAt: turns[0].timestamp,
    updatedAt: turns[turns.length - 1].timestamp,
  };
}

export function compareSummaries(a: ConversationSummary, b: ConversationSummary): number {
  return (
    b.updatedAt.getTime() - a.updatedAt.getTime() ||
    a.conversationId.localeCompare(b.conversationId)
  );
}
