/**
 * Global error handler
 *
 * Maps domain error kinds to HTTP statuses. Store faults and unexpected errors
 * are logged with their cause and answered with an opaque 500.
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { DomainError, type DomainErrorKind } from '@eurocoin/core';
import { logger } from '@eurocoin/observability';

const STATUS_BY_KIND: Record<DomainErrorKind, ContentfulStatusCode> = {
  not_found: 404,
  conflict: 409,
  validation: 400,
  store_failure: 500,
};

export function handleError(error: Error, c: Context) {
  const requestId = c.get('requestId');

  if (error instanceof HTTPException) {
    return error.getResponse();
  }

  if (error instanceof DomainError && error.kind !== 'store_failure') {
    return c.json({ error: error.message }, STATUS_BY_KIND[error.kind]);
  }

  logger.error(
    { err: error, cause: error.cause, requestId, path: c.req.path, method: c.req.method },
    'Request failed'
  );
  return c.json({ error: 'Internal server error' }, 500);
}
