export class PrismError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'PrismError';
  }
}

export class ConfigurationError extends PrismError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class SchemaValidationError extends PrismError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

/**
 * A model-provider call that could not be completed. `isRetryable` marks
 * transient (network-class) failures as opposed to rejected requests.
 */
export class LlmError extends PrismError {
  constructor(
    message: string,
    public readonly isRetryable: boolean,
    cause?: Error,
  ) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LlmError';
  }
}

export class MalformedModelResponseError extends PrismError {
  constructor(message: string) {
    super(message, 'MALFORMED_MODEL_RESPONSE');
    this.name = 'MalformedModelResponseError';
  }
}

/** Terminal failure of one agent run. Nothing is persisted for the run. */
export class PipelineError extends PrismError {
  constructor(
    message: string,
    public readonly step: string,
    cause?: Error,
  ) {
    super(message, 'PIPELINE_FAILED', cause);
    this.name = 'PipelineError';
  }
}

export class PersistenceError extends PrismError {
  constructor(message: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}

export class ConversationNotFoundError extends PrismError {
  constructor(public readonly conversationId: string) {
    super(`Conversation not found: ${conversationId}`, 'CONVERSATION_NOT_FOUND');
    this.name = 'ConversationNotFoundError';
  }
}

export class TimeoutError extends PrismError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
