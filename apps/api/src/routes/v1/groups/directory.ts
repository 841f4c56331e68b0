/**
 * Group CRUD
 *
 * GET    /v1/groups            - active groups
 * POST   /v1/groups            - create a group
 * GET    /v1/groups/:groupKey  - group context (members + stats)
 * PUT    /v1/groups/:groupKey  - rename
 * DELETE /v1/groups/:groupKey  - soft-delete the group and its memberships
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { CreateGroupRequestSchema, UpdateGroupRequestSchema } from '@eurocoin/types';
import { validationFailed } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const groupDirectoryRoute = new Hono<AppBindings>();

groupDirectoryRoute.get('/', async (c) => {
  const groups = await c.get('services').groups.listGroups();
  return c.json({ groups });
});

groupDirectoryRoute.post(
  '/',
  zValidator('json', CreateGroupRequestSchema, validationFailed),
  async (c) => {
    const group = await c.get('services').groups.createGroup(c.req.valid('json'));
    return c.json({ group }, 201);
  }
);

groupDirectoryRoute.get('/:groupKey', async (c) => {
  const group = await c.get('services').groupViews.getGroupContext(c.req.param('groupKey'));
  return c.json({ group });
});

groupDirectoryRoute.put(
  '/:groupKey',
  zValidator('json', UpdateGroupRequestSchema, validationFailed),
  async (c) => {
    const group = await c
      .get('services')
      .groups.updateGroup(c.req.param('groupKey'), c.req.valid('json'));
    return c.json({ group });
  }
);

groupDirectoryRoute.delete('/:groupKey', async (c) => {
  await c.get('services').groups.deleteGroup(c.req.param('groupKey'));
  return c.body(null, 204);
});

export { groupDirectoryRoute };
