import { Hono } from 'hono';
import { secureHeaders } from 'hono/secure-headers';
import type { ApiConfig } from './config.js';
import { handleError } from './lib/error-handler.js';
import { createCorsMiddleware } from './middleware/cors.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { requestLogMiddleware } from './middleware/request-log.js';
import { healthRoute } from './routes/health.js';
import { adminRoute } from './routes/v1/admin/index.js';
import { coinsRoute } from './routes/v1/coins/index.js';
import { groupsRoute } from './routes/v1/groups/index.js';
import { ownershipRoute } from './routes/v1/ownership/index.js';
import type { Services } from './services/index.js';
import type { AppBindings } from './types/context.js';

/**
 * Build the HTTP app over an already-wired service registry
 */
export function createApp(services: Services, config: ApiConfig) {
  const app = new Hono<AppBindings>();

  // Request ID first for log correlation
  app.use('*', requestIdMiddleware);
  app.use('*', requestLogMiddleware);
  app.use('*', createCorsMiddleware(config.webAppUrl));
  app.use('*', secureHeaders());

  app.use('*', async (c, next) => {
    c.set('services', services);
    c.set('config', config);
    await next();
  });

  app.route('/health', healthRoute);

  // Mount v1 routes
  const v1 = new Hono<AppBindings>();
  v1.route('/coins', coinsRoute);
  v1.route('/groups', groupsRoute);
  v1.route('/ownership', ownershipRoute);
  v1.route('/admin', adminRoute);

  app.route('/v1', v1);

  app.notFound((c) => c.json({ error: 'Not found' }, 404));
  app.onError(handleError);

  return app;
}
