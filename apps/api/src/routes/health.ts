import { Hono } from 'hono';
import { logger } from '@eurocoin/observability';
import type { AppBindings } from '../types/context.js';

const healthRoute = new Hono<AppBindings>();

healthRoute.get('/', (c) => {
  return c.json({
    status: 'ok' as const,
    timestamp: new Date().toISOString(),
    version: '1.0.0',
  });
});

healthRoute.get('/ready', (c) => {
  return c.json({ status: 'ready' as const });
});

/**
 * GET /health/store - uncached round trip to the relational store
 */
healthRoute.get('/store', async (c) => {
  try {
    await c.get('services').probeStore();
    return c.json({ status: 'ok' as const, store: 'connected' as const });
  } catch (error) {
    logger.error({ err: error, requestId: c.get('requestId') }, 'Store health check failed');
    return c.json({ status: 'error' as const, store: 'disconnected' as const }, 503);
  }
});

export { healthRoute };
