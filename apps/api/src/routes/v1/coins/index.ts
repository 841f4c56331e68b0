/**
 * Catalog browsing routes
 * Public, read-only; every read is served through the query cache
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { CoinListQuerySchema } from '@eurocoin/types';
import { validationFailed } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const coinsRoute = new Hono<AppBindings>();

/**
 * GET /v1/coins - one page of the catalog, newest year first
 */
coinsRoute.get('/', zValidator('query', CoinListQuerySchema, validationFailed), async (c) => {
  const { limit, offset, ...filters } = c.req.valid('query');

  const coins = await c.get('services').catalog.listCoins(filters, { limit, offset });

  return c.json({ coins, limit, offset });
});

coinsRoute.get('/stats', async (c) => {
  const stats = await c.get('services').catalog.getStats();
  return c.json(stats);
});

coinsRoute.get('/filters', async (c) => {
  const filters = await c.get('services').catalog.getFilterOptions();
  return c.json(filters);
});

coinsRoute.get('/:coinId', async (c) => {
  const coin = await c.get('services').catalog.requireCoin(c.req.param('coinId'));
  return c.json({ coin });
});

export { coinsRoute };
