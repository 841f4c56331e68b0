/**
 * Catalog Service Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { QueryCache } from '../../cache/query-cache.js';
import { InvalidPaginationError } from '../../shared/errors.js';
import { InMemoryCatalogRepository } from '../../testing/in-memory-repositories.js';
import { buildCoin } from '../../testing/fixtures.js';
import { CoinNotFoundError } from '../catalog-errors.js';
import { CatalogService } from '../catalog-service.js';

const COINS = [
  buildCoin({ coinId: 'FRA-1', country: 'France', year: 2002, value: 1 }),
  buildCoin({ coinId: 'FRA-2', country: 'France', year: 2002, value: 0.5, series: 'FRA-02' }),
  buildCoin({ coinId: 'ITA-1', country: 'Italy', year: 2005, value: 2, feature: 'Dante' }),
  buildCoin({
    coinId: 'DEU-CC',
    country: 'Germany',
    year: 2006,
    value: 2,
    coinType: 'CC',
    series: 'CC-2006',
    feature: 'Holstentor',
  }),
];

describe('CatalogService', () => {
  let catalogRepo: InMemoryCatalogRepository;
  let service: CatalogService;

  beforeEach(() => {
    catalogRepo = new InMemoryCatalogRepository(COINS);
    service = new CatalogService(catalogRepo, new QueryCache());
  });

  describe('listCoins', () => {
    it('should order coins newest year first, then by country', async () => {
      const coins = await service.listCoins({}, { limit: 10, offset: 0 });

      expect(coins.map((coin) => coin.coinId)).toEqual(['DEU-CC', 'ITA-1', 'FRA-1', 'FRA-2']);
    });

    it('should apply attribute filters', async () => {
      const coins = await service.listCoins({ country: 'France', value: 0.5 }, { limit: 10, offset: 0 });

      expect(coins.map((coin) => coin.coinId)).toEqual(['FRA-2']);
    });

    it('should serve repeated reads from the cache', async () => {
      // Arrange
      const findMany = vi.spyOn(catalogRepo, 'findMany');

      // Act
      await service.listCoins({ coinType: 'RE' }, { limit: 10, offset: 0 });
      await service.listCoins({ coinType: 'RE' }, { limit: 10, offset: 0 });

      // Assert
      expect(findMany).toHaveBeenCalledTimes(1);
    });

    it('should reject a limit above the maximum', async () => {
      await expect(service.listCoins({}, { limit: 501, offset: 0 })).rejects.toThrow(
        new InvalidPaginationError('Limit must be an integer between 1 and 500')
      );
    });
  });

  describe('requireCoin', () => {
    it('should return a known coin', async () => {
      expect(await service.requireCoin('ITA-1')).toEqual(COINS[2]);
    });

    it('should reject an unknown coin', async () => {
      await expect(service.requireCoin('NOPE')).rejects.toThrow(new CoinNotFoundError('NOPE'));
    });
  });

  describe('getStats', () => {
    it('should count coins, countries and types', async () => {
      expect(await service.getStats()).toEqual({
        totalCoins: 4,
        totalCountries: 3,
        regularCoins: 3,
        commemorativeCoins: 1,
      });
    });
  });

  describe('getFilterOptions', () => {
    it('should list countries, denominations highest first and commemorative series', async () => {
      expect(await service.getFilterOptions()).toEqual({
        countries: ['France', 'Germany', 'Italy'],
        denominations: [2, 1, 0.5],
        commemoratives: ['CC-2006'],
      });
    });
  });

  describe('listForAdmin', () => {
    it('should search country, series and feature and report the total', async () => {
      const view = await service.listForAdmin({ filters: {}, search: 'holsten', limit: 10, offset: 0 });

      expect(view.coins.map((coin) => coin.coinId)).toEqual(['DEU-CC']);
      expect(view.total).toBe(1);
    });

    it('should count every match beyond the page', async () => {
      const view = await service.listForAdmin({ filters: { country: 'France' }, limit: 1, offset: 0 });

      expect(view.coins).toHaveLength(1);
      expect(view.total).toBe(2);
    });
  });

  describe('getAdminFilterOptions', () => {
    it('should offer countries and both coin types', async () => {
      expect(await service.getAdminFilterOptions()).toEqual({
        countries: ['France', 'Germany', 'Italy'],
        coinTypes: ['RE', 'CC'],
      });
    });
  });
});
