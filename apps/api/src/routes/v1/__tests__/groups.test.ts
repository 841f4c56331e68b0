/**
 * Route tests for /v1/groups - directory, membership and group views
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { buildCoin, buildEvent, buildGroup, buildMember } from '@eurocoin/core/testing';
import { createTestContext, makeRequest, type TestContext } from '../../../test/helpers.js';

const FAMILY_ID = '3f2a9c1e-5b7d-4e8f-9a0b-1c2d3e4f5a6b';
const FRIENDS_ID = '8e7d6c5b-4a39-4281-b7c6-d5e4f3a2b1c0';

function seed() {
  return {
    coins: [
      buildCoin({ coinId: 'FRA-1', country: 'France', year: 2002 }),
      buildCoin({ coinId: 'ITA-1', country: 'Italy', year: 2002 }),
    ],
    groups: [
      buildGroup({ id: FAMILY_ID, groupKey: 'family', name: 'Family' }),
      buildGroup({ id: FRIENDS_ID, groupKey: 'friends', name: 'Friends' }),
    ],
    members: [
      buildMember({ id: 'm1', groupId: FAMILY_ID, name: 'alice', alias: 'Mum' }),
      buildMember({ id: 'm2', groupId: FRIENDS_ID, name: 'carol', alias: 'Caz' }),
    ],
    events: [
      buildEvent({ id: 'e1', name: 'alice', coinId: 'FRA-1', date: new Date('2024-01-01T00:00:00Z') }),
      buildEvent({ id: 'e2', name: 'carol', coinId: 'ITA-1', date: new Date('2024-02-01T00:00:00Z') }),
    ],
  };
}

describe('Group directory', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext(seed());
  });

  it('should list active groups by name', async () => {
    const response = await makeRequest(ctx.app, 'GET', '/v1/groups');

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      groups: [{ groupKey: 'family' }, { groupKey: 'friends' }],
    });
  });

  it('should create a group', async () => {
    const response = await makeRequest(ctx.app, 'POST', '/v1/groups', {
      body: { groupKey: 'club', name: 'Coin Club' },
    });

    expect(response.status).toBe(201);
    expect(await response.json()).toMatchObject({
      group: { groupKey: 'club', name: 'Coin Club', isActive: true },
    });
  });

  it('should return 409 for a key already in use', async () => {
    const response = await makeRequest(ctx.app, 'POST', '/v1/groups', {
      body: { groupKey: 'family', name: 'Another family' },
    });

    expect(response.status).toBe(409);
    expect(await response.json()).toEqual({ error: 'Group key "family" is already in use' });
  });

  it('should return 400 for a key that is not a slug', async () => {
    const response = await makeRequest(ctx.app, 'POST', '/v1/groups', {
      body: { groupKey: 'Bad Key', name: 'Bad' },
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: 'Validation failed' });
  });

  it('should return the group context with stats', async () => {
    const response = await makeRequest(ctx.app, 'GET', '/v1/groups/family');

    expect(await response.json()).toMatchObject({
      group: {
        id: FAMILY_ID,
        members: [{ name: 'alice', alias: 'Mum' }],
        stats: { totalMembers: 1, totalCoinsOwned: 1, totalOwnershipRecords: 1 },
      },
    });
  });

  it('should rename a group', async () => {
    const response = await makeRequest(ctx.app, 'PUT', '/v1/groups/family', {
      body: { name: 'Relatives' },
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ group: { groupKey: 'family', name: 'Relatives' } });
  });

  it('should soft-delete a group', async () => {
    const warm = await makeRequest(ctx.app, 'GET', '/v1/groups/family');
    const deleted = await makeRequest(ctx.app, 'DELETE', '/v1/groups/family');
    const lookup = await makeRequest(ctx.app, 'GET', '/v1/groups/family');

    expect(warm.status).toBe(200);
    expect(deleted.status).toBe(204);
    expect(lookup.status).toBe(404);
    expect(await lookup.json()).toEqual({ error: 'Group not found: family' });
  });
});

describe('Group members', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext(seed());
  });

  it('should add and list members', async () => {
    const added = await makeRequest(ctx.app, 'POST', '/v1/groups/family/members', {
      body: { name: 'bob', alias: 'Dad' },
    });
    const listed = await makeRequest(ctx.app, 'GET', '/v1/groups/family/members');

    expect(added.status).toBe(201);
    expect(await listed.json()).toMatchObject({
      members: [{ name: 'bob', alias: 'Dad' }, { name: 'alice', alias: 'Mum' }],
    });
  });

  it('should return 409 for an existing member', async () => {
    const response = await makeRequest(ctx.app, 'POST', '/v1/groups/family/members', {
      body: { name: 'alice', alias: 'Ali' },
    });

    expect(response.status).toBe(409);
    expect(await response.json()).toEqual({ error: 'alice is already a member of group family' });
  });

  it('should update an alias', async () => {
    const response = await makeRequest(ctx.app, 'PUT', '/v1/groups/family/members/alice', {
      body: { alias: 'Mother' },
    });

    expect(await response.json()).toMatchObject({ member: { name: 'alice', alias: 'Mother' } });
  });

  it('should remove a member and return 404 on a second removal', async () => {
    const first = await makeRequest(ctx.app, 'DELETE', '/v1/groups/family/members/alice');
    const second = await makeRequest(ctx.app, 'DELETE', '/v1/groups/family/members/alice');

    expect(first.status).toBe(204);
    expect(second.status).toBe(404);
    expect(await second.json()).toEqual({ error: 'alice is not a member of group family' });
  });
});

describe('Group views', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext(seed());
  });

  it('should annotate coins with owners from the group only', async () => {
    const response = await makeRequest(ctx.app, 'GET', '/v1/groups/family/coins');

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      coins: [
        {
          coinId: 'FRA-1',
          isOwned: true,
          ownerCount: 1,
          owners: [{ owner: 'alice', alias: 'Mum', acquiredDate: '2024-01-01T00:00:00.000Z' }],
        },
        { coinId: 'ITA-1', isOwned: false, ownerCount: 0, owners: [] },
      ],
      limit: 100,
      offset: 0,
    });
  });

  it('should filter to coins missing from the group', async () => {
    const response = await makeRequest(ctx.app, 'GET', '/v1/groups/family/coins?ownershipStatus=missing');

    expect(await response.json()).toMatchObject({ coins: [{ coinId: 'ITA-1' }] });
  });

  it('should reject a page larger than 500', async () => {
    const response = await makeRequest(ctx.app, 'GET', '/v1/groups/family/coins?limit=501');

    expect(response.status).toBe(400);
  });

  it('should return 404 for an unknown group', async () => {
    const response = await makeRequest(ctx.app, 'GET', '/v1/groups/nobody/coins');

    expect(response.status).toBe(404);
  });

  it('should return a member homepage', async () => {
    const response = await makeRequest(ctx.app, 'GET', '/v1/groups/family/members/alice/home');

    expect(await response.json()).toMatchObject({
      group: { groupKey: 'family' },
      member: { name: 'alice', alias: 'Mum' },
      coins: [{ coinId: 'FRA-1', acquiredDate: '2024-01-01T00:00:00.000Z' }],
      stats: { ownedCount: 1, countries: 1, regular: 1, commemorative: 0 },
    });
  });

  it('should return 404 for a homepage of a non-member', async () => {
    const response = await makeRequest(ctx.app, 'GET', '/v1/groups/family/members/carol/home');

    expect(response.status).toBe(404);
  });
});
