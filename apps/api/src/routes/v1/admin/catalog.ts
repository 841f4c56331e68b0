/**
 * Catalog administration
 *
 * GET  /v1/admin/coins          - searchable catalog view with total count
 * GET  /v1/admin/coins/filters  - filter options for the view
 * POST /v1/admin/coins/upload   - classify an uploaded CSV (text/csv body) as new, duplicate or conflict
 * POST /v1/admin/coins/import   - insert the selected rows in one batch
 * GET  /v1/admin/coins/export   - whole catalog as CSV
 * POST /v1/admin/coins/reset    - delete every catalog coin
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { AdminCoinQuerySchema, ImportCoinsRequestSchema } from '@eurocoin/types';
import { logger } from '@eurocoin/observability';
import { validationFailed } from '../../../lib/validation.js';
import { csvAttachment, uploadLimit } from './csv-response.js';
import type { AppBindings } from '../../../types/context.js';

const adminCatalogRoute = new Hono<AppBindings>();

adminCatalogRoute.get('/', zValidator('query', AdminCoinQuerySchema, validationFailed), async (c) => {
  const { coinType, country, search, limit, offset } = c.req.valid('query');

  const view = await c
    .get('services')
    .catalog.listForAdmin({ filters: { coinType, country }, search, limit, offset });

  return c.json({ ...view, limit, offset });
});

adminCatalogRoute.get('/filters', async (c) => {
  const options = await c.get('services').catalog.getAdminFilterOptions();
  return c.json(options);
});

adminCatalogRoute.post('/upload', uploadLimit, async (c) => {
  const { imports } = c.get('services');

  const rows = imports.parseCoinCsv(await c.req.text());
  const classification = await imports.classifyCoinUpload(rows);

  return c.json({
    ...classification,
    counts: {
      total: rows.length,
      new: classification.new.length,
      duplicate: classification.duplicate.length,
      conflict: classification.conflict.length,
    },
  });
});

adminCatalogRoute.post(
  '/import',
  zValidator('json', ImportCoinsRequestSchema, validationFailed),
  async (c) => {
    const imported = await c.get('services').imports.importSelected(c.req.valid('json').coins);
    return c.json({ imported });
  }
);

adminCatalogRoute.get('/export', async (c) => {
  const csv = await c.get('services').imports.exportCoinsCsv();
  return csvAttachment(c, csv, 'coins.csv');
});

adminCatalogRoute.post('/reset', async (c) => {
  const deleted = await c.get('services').imports.resetCatalog();
  logger.warn({ deleted, requestId: c.get('requestId') }, 'Catalog reset requested by admin');
  return c.json({ deleted });
});

export { adminCatalogRoute };
