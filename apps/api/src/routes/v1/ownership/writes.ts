/**
 * Ledger writes
 *
 * POST /v1/ownership/add    - record an acquisition (409 if already owned)
 * POST /v1/ownership/remove - record a removal (409 if not currently owned)
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { AddOwnershipRequestSchema, RemoveOwnershipRequestSchema } from '@eurocoin/types';
import { validationFailed } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const ownershipWritesRoute = new Hono<AppBindings>();

ownershipWritesRoute.post(
  '/add',
  zValidator('json', AddOwnershipRequestSchema, validationFailed),
  async (c) => {
    const id = await c.get('services').ownership.addOwnership(c.req.valid('json'));
    return c.json({ id }, 201);
  }
);

ownershipWritesRoute.post(
  '/remove',
  zValidator('json', RemoveOwnershipRequestSchema, validationFailed),
  async (c) => {
    const id = await c.get('services').ownership.removeOwnership(c.req.valid('json'));
    return c.json({ id });
  }
);

export { ownershipWritesRoute };
