import type { OpenAPIHono } from '@hono/zod-openapi';
import { createChildLogger } from '@logloom/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { health, SERVICE_VERSION } from './routes/health.js';
import { createStatsRoutes, type StatsSource } from './routes/stats.js';

const log = createChildLogger('service:server');

export interface AppDeps {
  readonly pipeline: StatsSource;
}

export function createApp(deps: AppDeps): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', requestId);

  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    log.debug(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration: Date.now() - start,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  app.route('/health', health);
  app.route('/stats', createStatsRoutes(deps.pipeline));

  app.get('/openapi.json', (c) => {
    return c.json(
      app.getOpenAPI31Document({
        openapi: '3.1.0',
        info: {
          title: 'logloom status API',
          version: SERVICE_VERSION,
          description: 'Read-only view of the log scoring pipeline',
        },
      }),
    );
  });

  return app;
}
