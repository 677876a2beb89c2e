import { OpenAPIHono } from '@hono/zod-openapi';
import type { ZodError } from 'zod';

export interface AppEnv {
  Variables: {
    requestId: string;
  };
}

/** Renders each issue as `path: message`; root-level issues carry no path prefix. */
export function formatIssues(error: ZodError): string[] {
  return error.errors.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

export interface ValidationFailureBody {
  readonly error: string;
  readonly code: 'VALIDATION_ERROR';
  readonly requestId: string;
  readonly details: readonly string[];
}

export function validationFailure(requestId: string, error: ZodError): ValidationFailureBody {
  return {
    error: 'Validation failed',
    code: 'VALIDATION_ERROR',
    requestId,
    details: formatIssues(error),
  };
}

// Every router shares the 400 shape so request validation matches the global error handler.
export function createRouter(): OpenAPIHono<AppEnv> {
  return new OpenAPIHono<AppEnv>({
    defaultHook: (result, c): Response | undefined => {
      if (!result.success) {
        return c.json(validationFailure(c.get('requestId'), result.error), 400);
      }
    },
  });
}
