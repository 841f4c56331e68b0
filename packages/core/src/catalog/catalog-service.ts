/**
 * Catalog Service
 *
 * Read-only browsing over the coin catalog. Every read goes through the shared
 * query cache under the `catalog` tag; catalog imports clear the cache wholesale.
 */

import type { CachedQuery, QueryCache } from '../cache/query-cache.js';
import { CATALOG_TAG, coinTag } from '../cache/cache-tags.js';
import { assertPage, type PageOptions } from '../shared/pagination.js';
import type { CatalogRepository } from './catalog-repository.js';
import { CoinNotFoundError } from './catalog-errors.js';
import type {
  AdminCatalogQuery,
  AdminCatalogView,
  AdminFilterOptions,
  CatalogFilterOptions,
  CatalogStats,
  Coin,
  CoinFilters,
} from './catalog-types.js';

export const MAX_CATALOG_PAGE_SIZE = 500;

const COMMEMORATIVE_SERIES_PREFIX = 'CC-';

export class CatalogService {
  private readonly coinList: CachedQuery<Coin[]>;
  private readonly coinById: CachedQuery<Coin | null>;
  private readonly stats: CachedQuery<CatalogStats>;
  private readonly filterOptions: CachedQuery<CatalogFilterOptions>;
  private readonly adminView: CachedQuery<AdminCatalogView>;
  private readonly countries: CachedQuery<string[]>;

  constructor(
    private catalogRepo: CatalogRepository,
    cache: QueryCache
  ) {
    this.coinList = cache.region<Coin[]>('catalog.list');
    this.coinById = cache.region<Coin | null>('catalog.coin');
    this.stats = cache.region<CatalogStats>('catalog.stats');
    this.filterOptions = cache.region<CatalogFilterOptions>('catalog.filterOptions');
    this.adminView = cache.region<AdminCatalogView>('catalog.admin');
    this.countries = cache.region<string[]>('catalog.countries');
  }

  /**
   * List coins ordered by year (newest first), then country
   *
   * @throws InvalidPaginationError if the page is unbounded or malformed
   */
  async listCoins(filters: CoinFilters, page: PageOptions): Promise<Coin[]> {
    assertPage(page, MAX_CATALOG_PAGE_SIZE);

    return this.coinList.getOrCompute(
      { params: { ...filters, limit: page.limit, offset: page.offset }, tags: [CATALOG_TAG] },
      () => this.catalogRepo.findMany(filters, 'listing', page)
    );
  }

  async getCoin(coinId: string): Promise<Coin | null> {
    return this.coinById.getOrCompute(
      { params: { coinId }, tags: [CATALOG_TAG, coinTag(coinId)] },
      () => this.catalogRepo.findById(coinId)
    );
  }

  /**
   * @throws CoinNotFoundError if the coin is not in the catalog
   */
  async requireCoin(coinId: string): Promise<Coin> {
    const coin = await this.getCoin(coinId);
    if (!coin) {
      throw new CoinNotFoundError(coinId);
    }
    return coin;
  }

  async getStats(): Promise<CatalogStats> {
    return this.stats.getOrCompute({ tags: [CATALOG_TAG] }, () => this.catalogRepo.getStats());
  }

  async getFilterOptions(): Promise<CatalogFilterOptions> {
    return this.filterOptions.getOrCompute({ tags: [CATALOG_TAG] }, async () => {
      const [countries, denominations, commemoratives] = await Promise.all([
        this.catalogRepo.findCountries(),
        this.catalogRepo.findDenominations(),
        this.catalogRepo.findSeriesWithPrefix(COMMEMORATIVE_SERIES_PREFIX),
      ]);
      return { countries, denominations, commemoratives };
    });
  }

  /**
   * Admin catalog view: filters plus free-text search over country, series and feature
   *
   * @returns One page of coins with the total number of matches
   * @throws InvalidPaginationError if the page is unbounded or malformed
   */
  async listForAdmin(query: AdminCatalogQuery): Promise<AdminCatalogView> {
    const page = { limit: query.limit, offset: query.offset };
    assertPage(page, MAX_CATALOG_PAGE_SIZE);

    const selection = { ...query.filters, search: query.search };

    return this.adminView.getOrCompute(
      { params: { ...selection, ...page }, tags: [CATALOG_TAG] },
      async () => {
        const [coins, total] = await Promise.all([
          this.catalogRepo.findMany(selection, 'listing', page),
          this.catalogRepo.count(selection),
        ]);
        return { coins, total };
      }
    );
  }

  async getAdminFilterOptions(): Promise<AdminFilterOptions> {
    const countries = await this.countries.getOrCompute({ tags: [CATALOG_TAG] }, () =>
      this.catalogRepo.findCountries()
    );
    return { countries, coinTypes: ['RE', 'CC'] };
  }
}
