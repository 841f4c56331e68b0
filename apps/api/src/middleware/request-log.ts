import type { Context, Next } from 'hono';
import { logger } from '@eurocoin/observability';

/**
 * One log line per request, with status and duration
 */
export async function requestLogMiddleware(c: Context, next: Next) {
  const startedAt = performance.now();

  await next();

  logger.info(
    {
      requestId: c.get('requestId'),
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - startedAt),
    },
    'Request completed'
  );
}
