/**
 * Ownership history administration
 *
 * GET  /v1/admin/history          - paginated raw ledger (search, owner, month)
 * GET  /v1/admin/history/filters  - distinct owner names
 * POST /v1/admin/history/upload   - classify an uploaded CSV (text/csv body) as new or duplicate
 * POST /v1/admin/history/import   - append the selected rows as acquisitions
 * GET  /v1/admin/history/export   - current ownerships as CSV, optionally for one owner
 * POST /v1/admin/history/reset    - delete every ledger event
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import {
  HistoryExportQuerySchema,
  HistoryListQuerySchema,
  ImportHistoryRequestSchema,
} from '@eurocoin/types';
import { logger } from '@eurocoin/observability';
import { validationFailed } from '../../../lib/validation.js';
import { csvAttachment, uploadLimit } from './csv-response.js';
import type { AppBindings } from '../../../types/context.js';

const adminHistoryRoute = new Hono<AppBindings>();

adminHistoryRoute.get(
  '/',
  zValidator('query', HistoryListQuerySchema, validationFailed),
  async (c) => {
    const page = await c.get('services').ownership.listHistory(c.req.valid('query'));
    return c.json(page);
  }
);

adminHistoryRoute.get('/filters', async (c) => {
  const options = await c.get('services').ownership.getHistoryFilterOptions();
  return c.json(options);
});

adminHistoryRoute.post('/upload', uploadLimit, async (c) => {
  const { imports } = c.get('services');

  const rows = imports.parseHistoryCsv(await c.req.text());
  const classification = await imports.classifyHistoryUpload(rows);

  return c.json({
    ...classification,
    counts: {
      total: rows.length,
      new: classification.new.length,
      duplicate: classification.duplicate.length,
    },
  });
});

adminHistoryRoute.post(
  '/import',
  zValidator('json', ImportHistoryRequestSchema, validationFailed),
  async (c) => {
    const { entries, createdBy } = c.req.valid('json');
    const imported = await c.get('services').imports.importHistory(entries, createdBy);
    return c.json({ imported });
  }
);

adminHistoryRoute.get(
  '/export',
  zValidator('query', HistoryExportQuerySchema, validationFailed),
  async (c) => {
    const { name } = c.req.valid('query');
    const csv = await c.get('services').imports.exportHistoryCsv(name);
    return csvAttachment(c, csv, name ? `history-${name}.csv` : 'history.csv');
  }
);

adminHistoryRoute.post('/reset', async (c) => {
  const deleted = await c.get('services').ownership.resetLedger();
  logger.warn({ deleted, requestId: c.get('requestId') }, 'Ownership ledger reset requested by admin');
  return c.json({ deleted });
});

export { adminHistoryRoute };
