/**
 * Catalog Domain Types
 */

import type { CoinType } from '@eurocoin/types';
import type { PageOptions } from '../shared/pagination.js';

export type { CoinType };

export interface Coin {
  coinId: string;
  coinType: CoinType;
  year: number;
  country: string;
  series: string;
  /** Face value in euros */
  value: number;
  imageUrl: string | null;
  feature: string | null;
  volume: string | null;
}

export interface CoinFilters {
  coinType?: CoinType;
  country?: string;
  series?: string;
  year?: number;
  value?: number;
}

/**
 * Repository-level selection: attribute filters plus free-text search and
 * explicit id constraints derived from ownership
 */
export interface CoinSelection extends CoinFilters {
  /** Case-insensitive match against country, series or feature */
  search?: string;
  /** Restrict to these ids; an empty list selects nothing */
  coinIds?: readonly string[];
  excludeCoinIds?: readonly string[];
}

/**
 * - listing: year desc, country asc, series asc
 * - export: year asc, series asc, country asc
 */
export type CoinOrder = 'listing' | 'export';

export interface CatalogStats {
  totalCoins: number;
  totalCountries: number;
  regularCoins: number;
  commemorativeCoins: number;
}

export interface CatalogFilterOptions {
  countries: string[];
  /** Distinct face values, highest first */
  denominations: number[];
  /** Commemorative series ids (`CC-` prefix) */
  commemoratives: string[];
}

export interface AdminCatalogQuery extends PageOptions {
  filters: CoinFilters;
  search?: string;
}

export interface AdminCatalogView {
  coins: Coin[];
  total: number;
}

export interface AdminFilterOptions {
  countries: string[];
  coinTypes: CoinType[];
}

export function isCoinType(value: string): value is CoinType {
  return value === 'RE' || value === 'CC';
}
