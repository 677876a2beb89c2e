import type { Answer, ContextBundle, Query } from '@prism/shared/src/types/agent.types.js';
import type { TurnMetadata } from '@prism/shared/src/types/conversation.types.js';
import { createChildLogger } from '@prism/shared/src/logger.js';
import {
  MalformedModelResponseError,
  PipelineError,
  toError,
} from '@prism/shared/src/utils/errors.js';
import type { EmbeddingClient } from '../embedding/embedding-client.js';
import type { LlmResponse } from '../llm/llm-types.js';
import type { ConversationRepository } from '../repositories/conversation.repository.js';
import type { PipelineGraphState, PipelineNode } from '../orchestration/pipeline-state.js';

const log = createChildLogger('agent:turn-recorder');

export interface TurnRecorderDeps {
  readonly conversationRepository: ConversationRepository;
  readonly fallbackAnswer: string;
  /** When set, both turns are stored with embeddings for chat-memory retrieval. */
  readonly embeddingClient?: EmbeddingClient;
  readonly now?: () => Date;
}

export function extractAnswerText(generation: LlmResponse): string {
  const text = generation.text.trim();
  if (text.length === 0) {
    throw new MalformedModelResponseError(
      generation.toolCalls.length > 0
        ? 'Model returned tool calls instead of an answer'
        : 'Model returned no answer text',
    );
  }
  return text;
}

async function embedTurns(
  embeddingClient: EmbeddingClient | undefined,
  texts: [string, string],
  conversationId: string,
): Promise<readonly (readonly number[] | undefined)[]> {
  if (!embeddingClient) {
    return [undefined, undefined];
  }
  try {
    return await embeddingClient.generateEmbeddings(texts);
  } catch (error) {
    log.warn({ conversationId, error: toError(error).message }, 'Turn embedding failed');
    return [undefined, undefined];
  }
}

async function persistTurns(
  deps: TurnRecorderDeps,
  query: Query,
  answer: string,
  metadata: TurnMetadata,
  answeredAt: Date,
): Promise<void> {
  const [userEmbedding, assistantEmbedding] = await embedTurns(
    deps.embeddingClient,
    [query.text, answer],
    query.conversationId,
  );

  await deps.conversationRepository.append({
    conversationId: query.conversationId,
    role: 'user',
    content: query.text,
    userId: query.userId,
    timestamp: query.submittedAt,
    embedding: userEmbedding,
  });
  await deps.conversationRepository.append({
    conversationId: query.conversationId,
    role: 'assistant',
    content: answer,
    userId: query.userId,
    timestamp: answeredAt,
    metadata,
    embedding: assistantEmbedding,
  });
}

function turnMetadata(
  bundle: ContextBundle,
  state: PipelineGraphState,
  malformedResponse: boolean,
): TurnMetadata {
  const toolName =
    state.toolOutcome?.status === 'success' ? state.toolOutcome.result.toolName : undefined;
  return {
    ...bundle.flags,
    ...(toolName ? { toolName } : {}),
    ...(malformedResponse ? { malformedResponse } : {}),
  };
}

export function createTurnRecorderNode(deps: TurnRecorderDeps): PipelineNode {
  const now = deps.now ?? ((): Date => new Date());

  return async (state: PipelineGraphState): Promise<Partial<PipelineGraphState>> => {
    const { query, bundle, generation } = state;
    if (!bundle || !generation) {
      throw new PipelineError('No generation to record', 'recordTurn');
    }

    let text: string;
    let malformed = false;
    try {
      text = extractAnswerText(generation);
    } catch (error) {
      if (!(error instanceof MalformedModelResponseError)) {
        throw error;
      }
      log.warn({ conversationId: query.conversationId, error: error.message }, 'Malformed model response');
      text = deps.fallbackAnswer;
      malformed = true;
    }

    const answeredAt = now();
    try {
      await persistTurns(deps, query, text, turnMetadata(bundle, state, malformed), answeredAt);
    } catch (error) {
      log.warn(
        { conversationId: query.conversationId, error: toError(error).message },
        'Failed to persist turns; answer is still returned',
      );
    }

    const answer: Answer = {
      answer: text,
      conversationId: query.conversationId,
      metadata: { ...bundle.flags, timestamp: answeredAt.toISOString() },
    };

    return { answer };
  };
}
