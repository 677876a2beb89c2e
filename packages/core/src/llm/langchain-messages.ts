import { AIMessage, HumanMessage, SystemMessage } from '@langchain/core/messages';
import type {
  AIMessageChunk,
  BaseMessage,
  MessageContent,
  MessageContentComplex,
} from '@langchain/core/messages';
import type { ToolCallRequest } from '@prism/shared/src/types/agent.types.js';
import type { ChatContentPart, ChatMessage, LlmResponse } from './llm-types.js';

function toLangChainContent(content: string | readonly ChatContentPart[]): MessageContent {
  if (typeof content === 'string') {
    return content;
  }
  return content.map((part): MessageContentComplex =>
    part.type === 'text'
      ? { type: 'text', text: part.text }
      : { type: 'image_url', image_url: `data:${part.image.mediaType};base64,${part.image.data}` },
  );
}

export function convertToLangChainMessages(messages: readonly ChatMessage[]): BaseMessage[] {
  return messages.map((message) => {
    switch (message.role) {
      case 'system':
        return new SystemMessage({ content: toLangChainContent(message.content) });
      case 'assistant':
        return new AIMessage({ content: toLangChainContent(message.content) });
      case 'user':
        return new HumanMessage({ content: toLangChainContent(message.content) });
    }
  });
}

function extractText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }
  const texts: string[] = [];
  for (const part of content) {
    if (part.type === 'text' && 'text' in part && typeof part.text === 'string') {
      texts.push(part.text);
    }
  }
  return texts.join('');
}

export function fromLangChainResponse(response: AIMessageChunk | AIMessage): LlmResponse {
  const toolCalls: ToolCallRequest[] = (response.tool_calls ?? []).map((call) => ({
    name: call.name,
    arguments: call.args,
  }));

  return {
    text: extractText(response.content),
    toolCalls,
    tokenUsage: response.usage_metadata
      ? {
          input: response.usage_metadata.input_tokens,
          output: response.usage_metadata.output_tokens,
        }
      : undefined,
  };
}
