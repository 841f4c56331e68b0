import { cors } from 'hono/cors';
import { logger } from '@eurocoin/observability';

export function computeAllowedOrigins(webAppUrl: string): Set<string> {
  const allowed = new Set<string>([webAppUrl]);

  try {
    const url = new URL(webAppUrl);
    const port = url.port ? `:${url.port}` : '';
    if (url.hostname.startsWith('www.')) {
      allowed.add(`${url.protocol}//${url.hostname.replace(/^www\./, '')}${port}`);
    } else if (!url.hostname.includes('localhost')) {
      allowed.add(`${url.protocol}//www.${url.hostname}${port}`);
    }
  } catch (error) {
    logger.warn({ err: error, webAppUrl }, 'Failed to parse WEB_APP_URL for CORS configuration');
  }

  return allowed;
}

export function createCorsMiddleware(webAppUrl: string) {
  const allowedOrigins = computeAllowedOrigins(webAppUrl);

  return cors({
    origin: (origin) => {
      // Configured web app URL (and www variant)
      if (origin && allowedOrigins.has(origin)) {
        return origin;
      }

      // Localhost for development
      if (origin && /^http:\/\/localhost:\d+$/.test(origin)) {
        return origin;
      }

      return '';
    },
    allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
    exposeHeaders: ['X-Request-Id', 'Content-Disposition'],
    maxAge: 86400,
  });
}
