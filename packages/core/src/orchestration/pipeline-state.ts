import { Annotation } from '@langchain/langgraph';
import type {
  Answer,
  ContextBundle,
  HistoryEntry,
  ModalityRetrieval,
  PlanningOutput,
  Query,
  ToolOutcome,
} from '@prism/shared/src/types/agent.types.js';
import type { LlmResponse } from '../llm/llm-types.js';

/** One channel per step output; a node reads only channels written before it. */
export const PipelineGraphAnnotation = Annotation.Root({
  query: Annotation<Query>,
  planning: Annotation<PlanningOutput | undefined>,
  toolOutcome: Annotation<ToolOutcome | undefined>,
  retrieval: Annotation<readonly ModalityRetrieval[] | undefined>,
  history: Annotation<readonly HistoryEntry[] | undefined>,
  bundle: Annotation<ContextBundle | undefined>,
  generation: Annotation<LlmResponse | undefined>,
  answer: Annotation<Answer | undefined>,
});

export type PipelineGraphState = typeof PipelineGraphAnnotation.State;

export type PipelineNode = (state: PipelineGraphState) => Promise<Partial<PipelineGraphState>>;
