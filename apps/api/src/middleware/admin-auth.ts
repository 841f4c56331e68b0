/**
 * Admin guard for the catalog and history management routes
 *
 * - IP allow-list (`0.0.0.0` allows any address)
 * - Bearer admin key, compared in constant time
 *
 * Without a configured key the admin surface is open; configuration refuses
 * that combination in production.
 */

import type { Context, Next } from 'hono';
import { timingSafeEqual } from 'node:crypto';
import { logger } from '@eurocoin/observability';
import { ANY_IP } from '../config.js';
import { resolveClientIp } from '../lib/client-ip.js';
import type { AppBindings } from '../types/context.js';

const BEARER_PREFIX = 'Bearer ';

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export async function adminAuthMiddleware(c: Context<AppBindings>, next: Next) {
  const { adminApiKey, adminAllowedIps } = c.get('config');
  const log = logger.child({ module: 'admin-auth', requestId: c.get('requestId') });

  if (!adminAllowedIps.includes(ANY_IP)) {
    const ip = resolveClientIp(c);
    if (!adminAllowedIps.includes(ip)) {
      log.warn({ ip }, 'Admin request from address outside the allow-list');
      return c.json({ error: 'Forbidden' }, 403);
    }
  }

  if (adminApiKey === undefined) {
    return next();
  }

  const header = c.req.header('authorization') ?? '';
  const provided = header.startsWith(BEARER_PREFIX) ? header.slice(BEARER_PREFIX.length) : '';
  if (!keysMatch(provided, adminApiKey)) {
    log.warn('Admin request with missing or invalid key');
    c.header('WWW-Authenticate', 'Bearer');
    return c.json({ error: 'Unauthorized' }, 401);
  }

  return next();
}
