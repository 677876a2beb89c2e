import { PipelineError, toError } from '@prism/shared/src/utils/errors.js';
import type { LlmClient } from '../llm/llm-types.js';
import { invokeWithRetry } from '../llm/retry.js';
import type { RetryPolicy } from '../llm/retry.js';
import { renderFinalMessages } from '../context/message-renderer.js';
import type { PipelineGraphState, PipelineNode } from '../orchestration/pipeline-state.js';

export interface AnswerGeneratorDeps {
  readonly llmClient: LlmClient;
  readonly systemPrompt: string;
  readonly retryPolicy: RetryPolicy;
}

export function createAnswerGeneratorNode(deps: AnswerGeneratorDeps): PipelineNode {
  return async (state: PipelineGraphState): Promise<Partial<PipelineGraphState>> => {
    const { bundle } = state;
    if (!bundle) {
      throw new PipelineError('Context was not assembled', 'generateAnswer');
    }

    try {
      const generation = await invokeWithRetry(
        'Generation call',
        () =>
          deps.llmClient.invoke({
            messages: renderFinalMessages(deps.systemPrompt, state.query.text, bundle),
          }),
        deps.retryPolicy,
      );
      return { generation };
    } catch (error) {
      throw new PipelineError('Answer generation failed', 'generateAnswer', toError(error));
    }
  };
}
