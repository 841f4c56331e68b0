/**
 * Ledger reads
 *
 * GET /v1/ownership/users/:name/coins    - coins the owner currently holds
 * GET /v1/ownership/users/:name/history  - full acquisition and removal history
 * GET /v1/ownership/coins/:coinId/owners - current owners of a coin
 *
 * Each accepts `groupId` to restrict the answer to active members of that group.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { GroupScopeQuerySchema } from '@eurocoin/types';
import type { CoinOwner } from '@eurocoin/core';
import { validationFailed } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const ownershipReadsRoute = new Hono<AppBindings>();

ownershipReadsRoute.get(
  '/users/:name/coins',
  zValidator('query', GroupScopeQuerySchema, validationFailed),
  async (c) => {
    const { groupId } = c.req.valid('query');
    const coins = await c.get('services').ownership.resolveOwnedCoins(c.req.param('name'), groupId);
    return c.json({ coins });
  }
);

ownershipReadsRoute.get(
  '/users/:name/history',
  zValidator('query', GroupScopeQuerySchema, validationFailed),
  async (c) => {
    const { groupId } = c.req.valid('query');
    const history = await c.get('services').ownership.getOwnerHistory(c.req.param('name'), groupId);
    return c.json({ history });
  }
);

ownershipReadsRoute.get(
  '/coins/:coinId/owners',
  zValidator('query', GroupScopeQuerySchema, validationFailed),
  async (c) => {
    const { ownership, groupViews } = c.get('services');
    const coinId = c.req.param('coinId');
    const { groupId } = c.req.valid('query');

    if (groupId !== undefined) {
      return c.json({ owners: await groupViews.getCoinOwnersInGroup(coinId, groupId) });
    }

    // Outside a group there is no alias; the ledger name stands in
    const current = await ownership.resolveCurrent(coinId);
    const owners: CoinOwner[] = current.map((entry) => ({
      owner: entry.name,
      alias: entry.name,
      acquiredDate: entry.date,
    }));
    return c.json({ owners });
  }
);

export { ownershipReadsRoute };
