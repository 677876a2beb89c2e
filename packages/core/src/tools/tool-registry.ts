import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { ToolResult } from '@prism/shared/src/types/agent.types.js';
import { SchemaValidationError } from '@prism/shared/src/utils/errors.js';
import type { ToolSpec } from '../llm/llm-types.js';

export interface ToolDefinition<TArgs extends z.ZodTypeAny> {
  readonly name: string;
  readonly description: string;
  readonly argsSchema: TArgs;
  execute(args: z.infer<TArgs>): Promise<ToolResult>;
}

/** A tool with its argument schema erased; `run` validates raw model arguments. */
export interface RegisteredTool {
  readonly spec: ToolSpec;
  run(rawArgs: unknown): Promise<ToolResult>;
}

export interface ToolRegistry {
  get(name: string): RegisteredTool | undefined;
  specs(): readonly ToolSpec[];
}

function toParameters(schema: z.ZodTypeAny): Record<string, unknown> {
  const parameters: Record<string, unknown> = {
    ...zodToJsonSchema(schema, { $refStrategy: 'none' }),
  };
  delete parameters['$schema'];
  return parameters;
}

export function defineTool<TArgs extends z.ZodTypeAny>(definition: ToolDefinition<TArgs>): RegisteredTool {
  return {
    spec: {
      name: definition.name,
      description: definition.description,
      parameters: toParameters(definition.argsSchema),
    },

    run(rawArgs: unknown): Promise<ToolResult> {
      const parsed = definition.argsSchema.safeParse(rawArgs);
      if (!parsed.success) {
        return Promise.reject(
          new SchemaValidationError(
            `Invalid arguments for ${definition.name}`,
            parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
          ),
        );
      }
      return definition.execute(parsed.data);
    },
  };
}

export function createToolRegistry(tools: readonly RegisteredTool[]): ToolRegistry {
  const byName = new Map(tools.map((tool) => [tool.spec.name, tool]));

  return {
    get(name: string): RegisteredTool | undefined {
      return byName.get(name);
    },

    specs(): readonly ToolSpec[] {
      return tools.map((tool) => tool.spec);
    },
  };
}
