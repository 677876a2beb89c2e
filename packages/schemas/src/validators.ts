import type { ZodError } from 'zod';
import { SchemaValidationError } from '@prism/shared/src/utils/errors.js';
import { AgentConfigSchema } from './agent-config.schema.js';
import type { AgentConfig } from './agent-config.schema.js';

function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateAgentConfig(data: unknown): AgentConfig {
  const result = AgentConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid agent configuration', formatZodErrors(result.error));
  }

  return result.data;
}
