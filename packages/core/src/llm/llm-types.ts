import type { ImagePreview } from '@prism/shared/src/types/retrieval.types.js';
import type { ToolCallRequest } from '@prism/shared/src/types/agent.types.js';

export type ChatRole = 'system' | 'user' | 'assistant';

export type ChatContentPart =
  | { readonly type: 'text'; readonly text: string }
  | { readonly type: 'image'; readonly image: ImagePreview };

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string | readonly ChatContentPart[];
}

/** Tool description handed to the model; `parameters` is a JSON Schema object. */
export interface ToolSpec {
  readonly name: string;
  readonly description: string;
  readonly parameters: Record<string, unknown>;
}

export interface LlmRequest {
  readonly messages: readonly ChatMessage[];
  readonly tools?: readonly ToolSpec[];
}

export interface LlmResponse {
  /** Concatenated text parts; empty when the model only requested tools. */
  readonly text: string;
  readonly toolCalls: readonly ToolCallRequest[];
  readonly tokenUsage?: {
    readonly input: number;
    readonly output: number;
  };
}

export interface LlmClient {
  invoke(request: LlmRequest): Promise<LlmResponse>;
}

export function messageText(message: ChatMessage): string {
  if (typeof message.content === 'string') {
    return message.content;
  }
  return message.content
    .flatMap((part) => (part.type === 'text' ? [part.text] : []))
    .join('\n');
}
