import { serve } from '@hono/node-server';
import { closeDatabase, getDatabase } from '@eurocoin/database';
import { logger } from '@eurocoin/observability';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createRepositories, createServices } from './services/index.js';

const config = loadConfig();

const { db } = getDatabase({ connectionString: config.databaseUrl, poolMax: config.databasePoolMax });
const services = createServices(createRepositories(db), { cacheTtlMs: config.cacheTtlMs });
const app = createApp(services, config);

if (config.adminApiKey === undefined) {
  logger.warn({ env: config.env }, 'ADMIN_API_KEY not set - admin routes are open');
}

logger.info({ port: config.port, env: config.env }, 'Starting server');

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info({ port: info.port }, 'Server running');
});

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals) {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info({ signal }, 'Shutting down');

  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
  services.cache.close();
  await closeDatabase();

  logger.info('Shutdown complete');
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      });
  });
}
