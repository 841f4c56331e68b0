/**
 * Route tests for /v1/ownership - ledger writes and owner/coin lookups
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { buildCoin, buildEvent, buildGroup, buildMember } from '@eurocoin/core/testing';
import { createTestContext, makeRequest, type TestContext } from '../../../test/helpers.js';

const FAMILY_ID = '7d8a4a5e-1c1f-4a4e-9a7b-2f7f5d0c9b11';

describe('Ownership routes', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext({
      coins: [
        buildCoin({ coinId: 'FRA-1', country: 'France', year: 2002 }),
        buildCoin({ coinId: 'ITA-1', country: 'Italy', year: 2002 }),
      ],
      groups: [buildGroup({ id: FAMILY_ID, groupKey: 'family', name: 'Family' })],
      members: [buildMember({ id: 'm1', groupId: FAMILY_ID, name: 'alice', alias: 'Mum' })],
      events: [
        buildEvent({ id: 'e1', name: 'alice', coinId: 'ITA-1', date: new Date('2024-01-01T00:00:00Z') }),
        buildEvent({ id: 'e2', name: 'bob', coinId: 'ITA-1', date: new Date('2024-02-01T00:00:00Z') }),
      ],
    });
  });

  describe('POST /v1/ownership/add', () => {
    it('should record an acquisition', async () => {
      // Act
      const response = await makeRequest(ctx.app, 'POST', '/v1/ownership/add', {
        body: { name: 'alice', coinId: 'FRA-1', date: '2024-03-01T00:00:00.000Z' },
      });

      // Assert
      expect(response.status).toBe(201);
      expect(await response.json()).toEqual({ id: expect.any(String) });
      expect(ctx.ownershipRepo.all).toHaveLength(3);
      expect(ctx.ownershipRepo.all[2]).toMatchObject({
        name: 'alice',
        coinId: 'FRA-1',
        isActive: true,
        createdBy: 'api',
      });
    });

    it('should return 409 when the owner already holds the coin', async () => {
      const response = await makeRequest(ctx.app, 'POST', '/v1/ownership/add', {
        body: { name: 'alice', coinId: 'ITA-1', date: '2024-03-01T00:00:00.000Z' },
      });

      expect(response.status).toBe(409);
      expect(await response.json()).toEqual({ error: 'alice already owns coin ITA-1' });
    });

    it('should return 404 for a coin missing from the catalog', async () => {
      const response = await makeRequest(ctx.app, 'POST', '/v1/ownership/add', {
        body: { name: 'alice', coinId: 'NOPE', date: '2024-03-01T00:00:00.000Z' },
      });

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: 'Coin not found: NOPE' });
    });

    it('should return 400 for a body without a name', async () => {
      const response = await makeRequest(ctx.app, 'POST', '/v1/ownership/add', {
        body: { coinId: 'FRA-1', date: '2024-03-01T00:00:00.000Z' },
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        error: 'Validation failed',
        issues: [{ path: ['name'] }],
      });
    });
  });

  describe('POST /v1/ownership/remove', () => {
    it('should record a removal', async () => {
      const response = await makeRequest(ctx.app, 'POST', '/v1/ownership/remove', {
        body: { name: 'alice', coinId: 'ITA-1', removalDate: '2024-03-01T00:00:00.000Z' },
      });

      expect(response.status).toBe(200);
      expect(ctx.ownershipRepo.all[2]).toMatchObject({
        name: 'alice',
        coinId: 'ITA-1',
        isActive: false,
        date: new Date('2024-03-01T00:00:00.000Z'),
      });
    });

    it('should return 409 when the owner does not hold the coin', async () => {
      const response = await makeRequest(ctx.app, 'POST', '/v1/ownership/remove', {
        body: { name: 'alice', coinId: 'FRA-1' },
      });

      expect(response.status).toBe(409);
      expect(await response.json()).toEqual({ error: 'alice does not currently own coin FRA-1' });
    });
  });

  describe('GET /v1/ownership/users/:name/coins', () => {
    it('should return the coins an owner holds', async () => {
      const response = await makeRequest(ctx.app, 'GET', '/v1/ownership/users/alice/coins');

      expect(await response.json()).toMatchObject({
        coins: [{ coinId: 'ITA-1', acquiredDate: '2024-01-01T00:00:00.000Z' }],
      });
    });

    it('should return nothing for an owner outside the group', async () => {
      const response = await makeRequest(
        ctx.app,
        'GET',
        `/v1/ownership/users/bob/coins?groupId=${FAMILY_ID}`
      );

      expect(await response.json()).toEqual({ coins: [] });
    });

    it('should reflect a removal on the next read', async () => {
      // Arrange
      await makeRequest(ctx.app, 'GET', '/v1/ownership/users/alice/coins');

      // Act
      await makeRequest(ctx.app, 'POST', '/v1/ownership/remove', {
        body: { name: 'alice', coinId: 'ITA-1' },
      });
      const response = await makeRequest(ctx.app, 'GET', '/v1/ownership/users/alice/coins');

      // Assert
      expect(await response.json()).toEqual({ coins: [] });
    });
  });

  describe('GET /v1/ownership/users/:name/history', () => {
    it('should return the ledger entries with their coins', async () => {
      const response = await makeRequest(ctx.app, 'GET', '/v1/ownership/users/alice/history');

      expect(await response.json()).toMatchObject({
        history: [{ id: 'e1', coinId: 'ITA-1', isActive: true, coin: { coinId: 'ITA-1' } }],
      });
    });
  });

  describe('GET /v1/ownership/coins/:coinId/owners', () => {
    it('should use the ledger name as alias outside a group', async () => {
      const response = await makeRequest(ctx.app, 'GET', '/v1/ownership/coins/ITA-1/owners');

      expect(await response.json()).toEqual({
        owners: [
          { owner: 'bob', alias: 'bob', acquiredDate: '2024-02-01T00:00:00.000Z' },
          { owner: 'alice', alias: 'alice', acquiredDate: '2024-01-01T00:00:00.000Z' },
        ],
      });
    });

    it('should keep only group members and use their alias', async () => {
      const response = await makeRequest(
        ctx.app,
        'GET',
        `/v1/ownership/coins/ITA-1/owners?groupId=${FAMILY_ID}`
      );

      expect(await response.json()).toEqual({
        owners: [{ owner: 'alice', alias: 'Mum', acquiredDate: '2024-01-01T00:00:00.000Z' }],
      });
    });

    it('should return 400 for a group id that is not a uuid', async () => {
      const response = await makeRequest(ctx.app, 'GET', '/v1/ownership/coins/ITA-1/owners?groupId=family');

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ issues: [{ path: ['groupId'] }] });
    });
  });
});
