import type { PlanningOutput } from '@prism/shared/src/types/agent.types.js';
import { createChildLogger } from '@prism/shared/src/logger.js';
import { PipelineError, toError } from '@prism/shared/src/utils/errors.js';
import type { LlmClient, LlmResponse } from '../llm/llm-types.js';
import { invokeWithRetry } from '../llm/retry.js';
import type { RetryPolicy } from '../llm/retry.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import { renderPlanningMessages } from '../context/message-renderer.js';
import type { PipelineGraphState, PipelineNode } from '../orchestration/pipeline-state.js';

const log = createChildLogger('agent:planner');

export interface PlannerDeps {
  readonly llmClient: LlmClient;
  readonly toolRegistry: ToolRegistry;
  readonly systemPrompt: string;
  readonly retryPolicy: RetryPolicy;
}

export function createPlannerNode(deps: PlannerDeps): PipelineNode {
  return async (state: PipelineGraphState): Promise<Partial<PipelineGraphState>> => {
    const { query } = state;

    let response: LlmResponse;
    try {
      response = await invokeWithRetry(
        'Planning call',
        () =>
          deps.llmClient.invoke({
            messages: renderPlanningMessages(deps.systemPrompt, query.text),
            tools: deps.toolRegistry.specs(),
          }),
        deps.retryPolicy,
      );
    } catch (error) {
      throw new PipelineError('Planning failed', 'plan', toError(error));
    }

    const [request, ...ignored] = response.toolCalls;
    if (ignored.length > 0) {
      log.warn(
        { conversationId: query.conversationId, ignored: ignored.map((c) => c.name) },
        'Model requested several tools; only the first is executed',
      );
    }

    const planning: PlanningOutput = request
      ? { kind: 'tool_call', request }
      : { kind: 'direct', text: response.text };

    log.info(
      { conversationId: query.conversationId, kind: planning.kind, toolName: request?.name },
      'Planning complete',
    );

    return { planning };
  };
}
