import { createRoute } from '@hono/zod-openapi';
import { createRouter } from '../types.js';
import { HealthResponseSchema } from '../schemas/responses.js';

export const SERVICE_VERSION = '0.1.0';

const healthRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Health'],
  summary: 'Health check',
  responses: {
    200: {
      description: 'Service is up',
      content: {
        'application/json': {
          schema: HealthResponseSchema,
        },
      },
    },
  },
});

const health = createRouter();

health.openapi(healthRoute, (c) => {
  return c.json({ status: 'ok', version: SERVICE_VERSION }, 200);
});

export { health };
