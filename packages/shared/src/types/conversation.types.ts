export type TurnRole = 'user' | 'assistant';

export interface ContextFlags {
  readonly hasDocContext: boolean;
  readonly hasImageContext: boolean;
  readonly hasToolOutput: boolean;
}

export interface TurnMetadata extends Partial<ContextFlags> {
  readonly malformedResponse?: boolean;
  readonly toolName?: string;
}

export interface Turn {
  readonly id: string;
  readonly conversationId: string;
  /** Position within the conversation, assigned on append. */
  readonly sequence: number;
  readonly role: TurnRole;
  readonly content: string;
  readonly userId: string;
  readonly timestamp: Date;
  readonly metadata?: TurnMetadata;
}

export interface ConversationSummary {
  readonly conversationId: string;
  readonly title: string;
  readonly turnCount: number;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface Conversation {
  readonly conversationId: string;
  readonly turns: readonly Turn[];
}

export interface TurnSearchResult {
  readonly turn: Turn;
  /** Cosine similarity against the query embedding. */
  readonly score: number;
}
