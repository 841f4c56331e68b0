/**
 * Catalog Domain
 *
 * Exports catalog repository, service, errors, and types.
 */

export { DrizzleCatalogRepository } from './catalog-repository.js';
export type { CatalogRepository } from './catalog-repository.js';

export { CatalogService, MAX_CATALOG_PAGE_SIZE } from './catalog-service.js';

export { CoinNotFoundError } from './catalog-errors.js';

export { isCoinType } from './catalog-types.js';
export type {
  AdminCatalogQuery,
  AdminCatalogView,
  AdminFilterOptions,
  CatalogFilterOptions,
  CatalogStats,
  Coin,
  CoinFilters,
  CoinOrder,
  CoinSelection,
  CoinType,
} from './catalog-types.js';
