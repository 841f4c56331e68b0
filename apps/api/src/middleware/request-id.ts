import type { Context, Next } from 'hono';
import { randomUUID } from 'node:crypto';

/**
 * Request ID middleware
 * Reuses an upstream id (load balancer, client) or generates one, and echoes
 * it in the response for log correlation
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const requestId = c.req.header('x-request-id') || c.req.header('x-correlation-id') || randomUUID();

  c.set('requestId', requestId);
  c.header('x-request-id', requestId);

  await next();
}
