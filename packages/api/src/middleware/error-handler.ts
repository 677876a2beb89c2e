import type { Context } from 'hono';
import { ZodError } from 'zod';
import {
  ConversationNotFoundError,
  LlmError,
  PersistenceError,
  PipelineError,
  SchemaValidationError,
} from '@prism/shared/src/utils/errors.js';
import { createChildLogger } from '@prism/shared/src/logger.js';
import { validationFailure, type AppEnv } from '../types.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof ZodError) {
    const body: ErrorResponse = validationFailure(requestId, err);
    return c.json(body, 400);
  }

  if (err instanceof SchemaValidationError) {
    const body: ErrorResponse = {
      error: err.message,
      code: err.code,
      requestId,
      details: err.validationErrors,
    };
    return c.json(body, 400);
  }

  if (err instanceof ConversationNotFoundError) {
    const body: ErrorResponse = {
      error: err.message,
      code: err.code,
      requestId,
    };
    return c.json(body, 404);
  }

  if (err instanceof PipelineError || err instanceof LlmError) {
    log.error(
      {
        requestId,
        error: err.message,
        step: err instanceof PipelineError ? err.step : undefined,
        cause: err.cause?.message,
      },
      'Agent run failed',
    );
    const body: ErrorResponse = {
      error: 'Language model processing failed',
      code: err.code,
      requestId,
    };
    return c.json(body, 502);
  }

  if (err instanceof PersistenceError) {
    log.error({ requestId, error: err.message }, 'Persistence error');
    const body: ErrorResponse = {
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
      requestId,
    };
    return c.json(body, 500);
  }

  log.error({ requestId, error: err.message }, 'Unhandled error');
  const body: ErrorResponse = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}
