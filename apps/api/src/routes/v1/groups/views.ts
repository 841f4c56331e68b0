/**
 * Group-scoped views
 *
 * GET /v1/groups/:groupKey/coins              - catalog page annotated with owners in the group
 * GET /v1/groups/:groupKey/members/:name/home - one member's collection page
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { GroupCoinsQuerySchema } from '@eurocoin/types';
import { validationFailed } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const groupViewsRoute = new Hono<AppBindings>();

groupViewsRoute.get(
  '/:groupKey/coins',
  zValidator('query', GroupCoinsQuerySchema, validationFailed),
  async (c) => {
    const { groups, groupViews } = c.get('services');
    const { limit, offset, ...filters } = c.req.valid('query');

    const group = await groups.requireGroupByKey(c.req.param('groupKey'));
    const coins = await groupViews.getGroupCoins(group.id, filters, { limit, offset });

    return c.json({ coins, limit, offset });
  }
);

groupViewsRoute.get('/:groupKey/members/:name/home', async (c) => {
  const { groupKey, name } = c.req.param();
  const homepage = await c.get('services').groupViews.getMemberHomepage(groupKey, name);
  return c.json(homepage);
});

export { groupViewsRoute };
