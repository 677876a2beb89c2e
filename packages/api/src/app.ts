import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { AgentRuntime } from '@prism/core/src/orchestration/agent-runtime.js';
import { createChildLogger } from '@prism/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { createHealthRoutes } from './routes/health.js';
import { createAgentRoutes } from './routes/agent.js';
import { createSearchRoutes } from './routes/search.js';

const log = createChildLogger('api:server');

export const APP_VERSION = '0.1.0';

export interface AppConfig {
  readonly runtime: Pick<AgentRuntime, 'pipeline' | 'federator' | 'conversationService'>;
  /** Allowed CORS origins; all origins when empty or absent. */
  readonly corsOrigins?: readonly string[];
  /** Skips per-request logging. */
  readonly quiet?: boolean;
}

export function createApp(config: AppConfig): OpenAPIHono<AppEnv> {
  const app = createRouter();

  const origins = config.corsOrigins ?? [];
  app.use('*', cors(origins.length > 0 ? { origin: [...origins] } : undefined));
  app.use('*', requestId);

  if (!config.quiet) {
    app.use('*', async (c, next) => {
      const start = Date.now();
      await next();
      const duration = Date.now() - start;
      log.info(
        {
          method: c.req.method,
          path: c.req.path,
          status: c.res.status,
          duration,
          requestId: c.get('requestId'),
        },
        'Request completed',
      );
    });
  }

  app.onError(errorHandler);

  app.route('/health', createHealthRoutes({ version: APP_VERSION }));

  app.get('/openapi.json', (c) => {
    const spec = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: {
        title: 'Prism API',
        version: APP_VERSION,
        description: 'Conversational retrieval over documents, images and video',
      },
    });
    return c.json(spec);
  });

  app.route(
    '/api/agent',
    createAgentRoutes({
      pipeline: config.runtime.pipeline,
      conversationService: config.runtime.conversationService,
    }),
  );
  app.route('/api/search', createSearchRoutes({ federator: config.runtime.federator }));

  return app;
}
