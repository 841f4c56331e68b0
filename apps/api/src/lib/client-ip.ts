import type { Context } from 'hono';
import { getConnInfo } from '@hono/node-server/conninfo';
import { isIP } from 'node:net';

function normalizeIp(value?: string | null): string | null {
  if (!value) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed && isIP(trimmed) ? trimmed : null;
}

function getRemoteAddress(c: Context): string | null {
  try {
    return normalizeIp(getConnInfo(c).remote.address);
  } catch {
    // getConnInfo throws outside the node-server runtime (app.request in tests)
    return null;
  }
}

function getHeaderIp(c: Context): string | null {
  const realIp = normalizeIp(c.req.header('x-real-ip'));
  if (realIp) {
    return realIp;
  }
  // First entry is the one closest to the client
  return normalizeIp(c.req.header('x-forwarded-for')?.split(',')[0]);
}

/**
 * Client IP: the connection address, or forwarded headers when there is no
 * connection info. Falls back to "unknown".
 */
export function resolveClientIp(c: Context): string {
  return getRemoteAddress(c) ?? getHeaderIp(c) ?? 'unknown';
}
