import type { PipelineGraphState, PipelineNode } from '../orchestration/pipeline-state.js';
import type { ToolInvoker } from '../tools/tool-invoker.js';

export function createToolExecutorNode(toolInvoker: ToolInvoker): PipelineNode {
  return async (state: PipelineGraphState): Promise<Partial<PipelineGraphState>> => {
    const request = state.planning?.kind === 'tool_call' ? state.planning.request : undefined;
    return { toolOutcome: await toolInvoker.invoke(request) };
  };
}
