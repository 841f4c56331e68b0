/**
 * Group membership
 *
 * GET    /v1/groups/:groupKey/members        - active members, alias order
 * POST   /v1/groups/:groupKey/members        - add a member
 * PUT    /v1/groups/:groupKey/members/:name  - change the alias
 * DELETE /v1/groups/:groupKey/members/:name  - soft-delete the membership
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { AddMemberRequestSchema, UpdateMemberRequestSchema } from '@eurocoin/types';
import { validationFailed } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const groupMembersRoute = new Hono<AppBindings>();

groupMembersRoute.get('/:groupKey/members', async (c) => {
  const { groups } = c.get('services');
  const group = await groups.requireGroupByKey(c.req.param('groupKey'));
  const members = await groups.listMembers(group.id);
  return c.json({ members });
});

groupMembersRoute.post(
  '/:groupKey/members',
  zValidator('json', AddMemberRequestSchema, validationFailed),
  async (c) => {
    const member = await c
      .get('services')
      .groups.addMember(c.req.param('groupKey'), c.req.valid('json'));
    return c.json({ member }, 201);
  }
);

groupMembersRoute.put(
  '/:groupKey/members/:name',
  zValidator('json', UpdateMemberRequestSchema, validationFailed),
  async (c) => {
    const { groupKey, name } = c.req.param();
    const member = await c
      .get('services')
      .groups.updateMemberAlias(groupKey, name, c.req.valid('json').alias);
    return c.json({ member });
  }
);

groupMembersRoute.delete('/:groupKey/members/:name', async (c) => {
  const { groupKey, name } = c.req.param();
  await c.get('services').groups.removeMember(groupKey, name);
  return c.body(null, 204);
});

export { groupMembersRoute };
