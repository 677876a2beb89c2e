import { randomUUID } from 'node:crypto';
import { StateGraph, START, END } from '@langchain/langgraph';
import type { Answer, Query } from '@prism/shared/src/types/agent.types.js';
import type { AgentConfig } from '@prism/schemas/src/agent-config.schema.js';
import { createChildLogger } from '@prism/shared/src/logger.js';
import { PipelineError, toError } from '@prism/shared/src/utils/errors.js';
import type { LlmClient } from '../llm/llm-types.js';
import type { RetryPolicy } from '../llm/retry.js';
import type { EmbeddingClient } from '../embedding/embedding-client.js';
import type { ConversationRepository } from '../repositories/conversation.repository.js';
import type { RetrievalFederator } from '../retrieval/federator.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import { createToolInvoker } from '../tools/tool-invoker.js';
import { PipelineGraphAnnotation } from './pipeline-state.js';
import { createPlannerNode } from '../agents/planner.js';
import { createToolExecutorNode } from '../agents/tool-executor.js';
import { createContextRetrieverNode } from '../agents/context-retriever.js';
import { createHistoryLoaderNode } from '../agents/history-loader.js';
import { createContextAssemblyNode } from '../agents/context-assembly.js';
import { createAnswerGeneratorNode } from '../agents/answer-generator.js';
import { createTurnRecorderNode } from '../agents/turn-recorder.js';

const log = createChildLogger('orchestration:pipeline');

export const DEFAULT_USER_ID = 'local_user';

export interface PipelineConfig {
  readonly agentConfig: AgentConfig;
  readonly llmClient: LlmClient;
  readonly toolRegistry: ToolRegistry;
  readonly federator: RetrievalFederator;
  readonly conversationRepository: ConversationRepository;
  readonly embeddingClient?: EmbeddingClient;
  readonly defaultUserId?: string;
  readonly now?: () => Date;
  /** Backoff before a model-call retry. */
  readonly retryBaseDelayMs?: number;
}

export interface PipelineInput {
  readonly text: string;
  readonly conversationId?: string;
  readonly userId?: string;
}

export interface Pipeline {
  /** Rejects only with `PipelineError`; every other failure is absorbed inside the run. */
  run(input: PipelineInput): Promise<Answer>;
}

export function createPipeline(config: PipelineConfig): Pipeline {
  const { agentConfig } = config;
  const now = config.now ?? ((): Date => new Date());
  const retryPolicy: RetryPolicy = {
    maxRetries: agentConfig.retry.maxRetries,
    timeoutMs: agentConfig.timeouts.modelMs,
    baseDelayMs: config.retryBaseDelayMs,
  };

  log.info(
    {
      version: agentConfig.version,
      model: agentConfig.model.name,
      modalities: agentConfig.retrieval.modalities.map((m) => m.modality),
      tools: config.toolRegistry.specs().map((t) => t.name),
    },
    'Initializing agent pipeline',
  );

  const graph = new StateGraph(PipelineGraphAnnotation)
    .addNode(
      'plan',
      createPlannerNode({
        llmClient: config.llmClient,
        toolRegistry: config.toolRegistry,
        systemPrompt: agentConfig.prompts.planning,
        retryPolicy,
      }),
    )
    .addNode(
      'executeTool',
      createToolExecutorNode(
        createToolInvoker({
          registry: config.toolRegistry,
          timeoutMs: agentConfig.timeouts.toolMs,
        }),
      ),
    )
    .addNode(
      'retrieveContext',
      createContextRetrieverNode({
        federator: config.federator,
        modalities: agentConfig.retrieval.modalities,
      }),
    )
    .addNode(
      'fetchHistory',
      createHistoryLoaderNode({
        conversationRepository: config.conversationRepository,
        turns: agentConfig.history.turns,
      }),
    )
    .addNode(
      'assembleContext',
      createContextAssemblyNode({
        charBudget: agentConfig.context.charBudget,
        historyTurns: agentConfig.history.turns,
      }),
    )
    .addNode(
      'generateAnswer',
      createAnswerGeneratorNode({
        llmClient: config.llmClient,
        systemPrompt: agentConfig.prompts.final,
        retryPolicy,
      }),
    )
    .addNode(
      'recordTurn',
      createTurnRecorderNode({
        conversationRepository: config.conversationRepository,
        fallbackAnswer: agentConfig.fallbackAnswer,
        embeddingClient: config.embeddingClient,
        now,
      }),
    )
    .addEdge(START, 'plan')
    .addEdge('plan', 'executeTool')
    .addEdge('plan', 'retrieveContext')
    .addEdge('plan', 'fetchHistory')
    .addEdge(['executeTool', 'retrieveContext', 'fetchHistory'], 'assembleContext')
    .addEdge('assembleContext', 'generateAnswer')
    .addEdge('generateAnswer', 'recordTurn')
    .addEdge('recordTurn', END)
    .compile();

  return {
    async run(input: PipelineInput): Promise<Answer> {
      const query: Query = {
        text: input.text,
        conversationId: input.conversationId ?? randomUUID(),
        userId: input.userId ?? config.defaultUserId ?? DEFAULT_USER_ID,
        submittedAt: now(),
      };

      log.info(
        { conversationId: query.conversationId, isNew: input.conversationId === undefined },
        'Running agent pipeline',
      );

      const result = await graph.invoke({ query }).catch((error: unknown) => {
        const failure =
          error instanceof PipelineError
            ? error
            : new PipelineError('Agent run failed', 'unknown', toError(error));
        log.error(
          { conversationId: query.conversationId, step: failure.step, error: failure.cause?.message },
          failure.message,
        );
        throw failure;
      });

      if (!result.answer) {
        throw new PipelineError('Run finished without an answer', 'recordTurn');
      }

      log.info(
        { conversationId: query.conversationId, ...result.answer.metadata },
        'Pipeline complete',
      );

      return result.answer;
    },
  };
}
