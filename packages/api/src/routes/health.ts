import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import { createRouter, type AppEnv } from '../types.js';
import { HealthResponseSchema } from '../schemas/responses.js';

export interface HealthRouteOptions {
  readonly version: string;
  readonly now?: () => Date;
}

const healthRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Health'],
  summary: 'Liveness probe with build version and uptime',
  responses: {
    200: {
      description: 'Service is up',
      content: { 'application/json': { schema: HealthResponseSchema } },
    },
  },
});

export function createHealthRoutes(options: HealthRouteOptions): OpenAPIHono<AppEnv> {
  const now = options.now ?? ((): Date => new Date());
  const startedAt = now();
  const router = createRouter();

  router.openapi(healthRoute, (c) =>
    c.json(
      {
        status: 'ok' as const,
        version: options.version,
        startedAt: startedAt.toISOString(),
        uptimeSeconds: Math.floor((now().getTime() - startedAt.getTime()) / 1000),
      },
      200,
    ),
  );

  return router;
}
