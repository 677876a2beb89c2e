import type { ToolCallRequest, ToolOutcome } from '@prism/shared/src/types/agent.types.js';
import { createChildLogger } from '@prism/shared/src/logger.js';
import { SchemaValidationError, TimeoutError, toError } from '@prism/shared/src/utils/errors.js';
import { withTimeout } from '@prism/shared/src/utils/async.js';
import type { ToolRegistry } from './tool-registry.js';

const log = createChildLogger('tools:invoker');

export interface ToolInvoker {
  /** Never rejects: every failure becomes an error outcome. */
  invoke(request?: ToolCallRequest): Promise<ToolOutcome>;
}

export interface ToolInvokerDeps {
  readonly registry: ToolRegistry;
  readonly timeoutMs: number;
}

function describeFailure(error: Error): string {
  if (error instanceof SchemaValidationError) {
    return `${error.message}: ${error.validationErrors.join('; ')}`;
  }
  return error.message;
}

export function createToolInvoker(deps: ToolInvokerDeps): ToolInvoker {
  return {
    async invoke(request?: ToolCallRequest): Promise<ToolOutcome> {
      if (!request) {
        return { status: 'none' };
      }

      const tool = deps.registry.get(request.name);
      if (!tool) {
        log.warn({ toolName: request.name }, 'Model requested an unknown tool');
        return {
          status: 'error',
          error: {
            kind: 'UnknownTool',
            toolName: request.name,
            message: `Unknown tool: ${request.name}`,
          },
        };
      }

      try {
        const result = await withTimeout(
          tool.run(request.arguments),
          deps.timeoutMs,
          `Tool ${request.name}`,
        );
        log.info({ toolName: request.name, contentLength: result.content.length }, 'Tool completed');
        return { status: 'success', result };
      } catch (error) {
        const cause = toError(error);
        const kind = cause instanceof TimeoutError ? 'Timeout' : 'ExecutionFailure';
        const message = describeFailure(cause);
        log.warn({ toolName: request.name, kind, error: message }, 'Tool failed');
        return { status: 'error', error: { kind, toolName: request.name, message, cause } };
      }
    },
  };
}
