import { createChildLogger } from '@prism/shared/src/logger.js';
import { ConfigurationError } from '@prism/shared/src/utils/errors.js';
import type { ToolCallRequest } from '@prism/shared/src/types/agent.types.js';
import type { AgentConfig } from '@prism/schemas/src/agent-config.schema.js';
import { messageText } from './llm-types.js';
import type { ChatMessage, LlmClient, LlmRequest, LlmResponse, ToolSpec } from './llm-types.js';

const log = createChildLogger('llm:client');

export interface LlmClientOptions {
  readonly model: AgentConfig['model'];
}

const WEB_SEARCH_HINTS = ['latest', 'news', 'today', 'current', 'web'];
const TRANSCRIPT_HINTS = ['video', 'transcript', 'said in'];

function lastUserText(messages: readonly ChatMessage[]): string {
  const lastUser = [...messages].reverse().find((m) => m.role === 'user');
  return lastUser ? messageText(lastUser) : '';
}

function chooseMockToolCall(
  query: string,
  tools: readonly ToolSpec[],
): ToolCallRequest | undefined {
  const lower = query.toLowerCase();
  const available = new Set(tools.map((t) => t.name));

  if (available.has('search_video_transcripts') && TRANSCRIPT_HINTS.some((h) => lower.includes(h))) {
    return { name: 'search_video_transcripts', arguments: { queryText: query } };
  }
  if (available.has('web_search') && WEB_SEARCH_HINTS.some((h) => lower.includes(h))) {
    return { name: 'web_search', arguments: { keywords: query } };
  }
  return undefined;
}

export function createMockLlmClient(): LlmClient {
  log.info('Using mock LLM client');

  return {
    invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ messageCount: request.messages.length }, 'Mock LLM invocation');

      const query = lastUserText(request.messages);
      const tokenUsage = { input: 100, output: 50 };

      if (request.tools && request.tools.length > 0) {
        const toolCall = chooseMockToolCall(query, request.tools);
        return Promise.resolve(
          toolCall
            ? { text: '', toolCalls: [toolCall], tokenUsage }
            : { text: 'No tool needed.', toolCalls: [], tokenUsage },
        );
      }

      const question = query.split('\n').at(-1) ?? query;
      return Promise.resolve({ text: `Mock answer to: ${question}`, toolCalls: [], tokenUsage });
    },
  };
}

/** One request per call; timeouts and retries belong to the caller. */
async function createVertexLlmClient(options: LlmClientOptions): Promise<LlmClient> {
  const projectId = process.env['PRISM_GCP_PROJECT_ID'] ?? process.env['GCP_PROJECT_ID'];
  const location = process.env['VERTEX_AI_LOCATION'] ?? 'europe-west1';

  if (!projectId) {
    throw new ConfigurationError(
      'PRISM_GCP_PROJECT_ID environment variable is required for Vertex AI LLM client',
    );
  }

  const [{ ChatVertexAI }, { convertToLangChainMessages, fromLangChainResponse }] =
    await Promise.all([import('@langchain/google-vertexai'), import('./langchain-messages.js')]);

  const model = new ChatVertexAI({
    model: options.model.name,
    location,
    temperature: options.model.temperature,
    maxOutputTokens: options.model.maxOutputTokens,
    authOptions: { projectId },
  });

  log.info({ projectId, location, model: options.model.name }, 'Using Vertex AI LLM client');

  return {
    async invoke(request: LlmRequest): Promise<LlmResponse> {
      const messages = convertToLangChainMessages(request.messages);
      const tools = request.tools ?? [];

      log.debug(
        { messageCount: messages.length, toolCount: tools.length },
        'Vertex AI LLM invocation',
      );

      if (tools.length > 0) {
        const bound = model.bindTools(
          tools.map((tool) => ({
            type: 'function' as const,
            function: {
              name: tool.name,
              description: tool.description,
              parameters: tool.parameters,
            },
          })),
        );
        return fromLangChainResponse(await bound.invoke(messages));
      }

      return fromLangChainResponse(await model.invoke(messages));
    },
  };
}

export async function createLlmClient(options: LlmClientOptions): Promise<LlmClient> {
  if (process.env['PRISM_MOCK_LLM'] === 'true') {
    return createMockLlmClient();
  }

  return createVertexLlmClient(options);
}
