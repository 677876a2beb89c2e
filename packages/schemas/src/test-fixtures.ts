import type { AgentConfig } from './agent-config.schema.js';

/** A valid agent configuration with small limits, for tests across packages. */
export function createTestAgentConfig(overrides: Partial<AgentConfig> = {}): AgentConfig {
  return {
    version: '1.0.0',
    model: { name: 'test-model', temperature: 0.7, maxOutputTokens: 1024 },
    prompts: {
      planning: 'Identify the best tool to answer the user query.',
      final: 'Answer the user query from the provided context.',
    },
    retrieval: {
      modalities: [
        { modality: 'document', limit: 20, threshold: 0.5 },
        { modality: 'image', limit: 5, threshold: 0.25 },
        { modality: 'video_frame', limit: 5, threshold: 0.25 },
        { modality: 'chat_memory', limit: 10, threshold: 0.8 },
      ],
    },
    history: { turns: 6 },
    context: { charBudget: 12000 },
    timeouts: { modelMs: 1000, toolMs: 1000, retrievalMs: 1000 },
    retry: { maxRetries: 1 },
    fallbackAnswer: 'No answer available.',
    tools: {
      webSearch: { maxResults: 5 },
      transcriptSearch: { limit: 20, threshold: 0.7 },
    },
    ...overrides,
  };
}
