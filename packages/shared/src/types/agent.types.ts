import type { ImagePreview, Modality, RetrievalHit } from './retrieval.types.js';
import type { ContextFlags, TurnRole } from './conversation.types.js';

export interface Query {
  readonly text: string;
  readonly conversationId: string;
  readonly userId: string;
  readonly submittedAt: Date;
}

export interface ToolCallRequest {
  readonly name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
}

export type PlanningOutput =
  | { readonly kind: 'tool_call'; readonly request: ToolCallRequest }
  | { readonly kind: 'direct'; readonly text: string };

export interface ToolResult {
  readonly toolName: string;
  readonly arguments: Readonly<Record<string, unknown>>;
  /** Text handed to the model. */
  readonly content: string;
  readonly data?: unknown;
}

export type ToolErrorKind = 'UnknownTool' | 'ExecutionFailure' | 'Timeout';

export interface ToolError {
  readonly kind: ToolErrorKind;
  readonly toolName: string;
  readonly message: string;
  readonly cause?: Error;
}

export type ToolOutcome =
  | { readonly status: 'none' }
  | { readonly status: 'success'; readonly result: ToolResult }
  | { readonly status: 'error'; readonly error: ToolError };

export type ModalityRetrieval =
  | { readonly modality: Modality; readonly status: 'ok'; readonly hits: readonly RetrievalHit[] }
  | { readonly modality: Modality; readonly status: 'degraded'; readonly reason: string };

export interface HistoryEntry {
  readonly role: TurnRole;
  readonly content: string;
}

export interface ToolSection {
  readonly kind: 'tool';
  readonly label: string;
  readonly toolName: string;
  readonly content: string;
}

export interface RetrievalSection {
  readonly kind: 'retrieval';
  readonly label: string;
  readonly modality: Modality;
  readonly hits: readonly RetrievalHit[];
}

export interface HistorySection {
  readonly kind: 'history';
  readonly label: string;
  readonly turns: readonly HistoryEntry[];
}

export type ContextSection = ToolSection | RetrievalSection | HistorySection;

export interface InlineImage {
  readonly modality: Modality;
  readonly sectionLabel: string;
  readonly sourceId: string;
  readonly similarity: number;
  readonly preview: ImagePreview;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface ContextBundle {
  readonly sections: readonly ContextSection[];
  readonly images: readonly InlineImage[];
  /** Rendered text of every section; its length is what the budget bounds. */
  readonly text: string;
  readonly flags: ContextFlags;
  readonly droppedHits: number;
}

export interface AnswerMetadata extends ContextFlags {
  readonly timestamp: string;
}

export interface Answer {
  readonly answer: string;
  readonly conversationId: string;
  readonly metadata: AnswerMetadata;
}
