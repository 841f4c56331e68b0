/**
 * Catalog Repository
 *
 * Data access layer for catalog coins.
 * Pure store operations with no business logic.
 */

import {
  and,
  asc,
  count,
  countDistinct,
  desc,
  eq,
  ilike,
  inArray,
  like,
  ne,
  notInArray,
  or,
  sql,
  type SQL,
} from 'drizzle-orm';
import { catalog, type CatalogRow, type Database } from '@eurocoin/database';
import { chunkForStatement, escapeLikePattern, runStoreOperation } from '../shared/store.js';
import type { PageOptions } from '../shared/pagination.js';
import { isCoinType } from './catalog-types.js';
import type { CatalogStats, Coin, CoinOrder, CoinSelection } from './catalog-types.js';

// Columns bound per inserted coin; created_at and updated_at take their defaults
const INSERT_PARAMS_PER_COIN = 9;

export interface CatalogRepository {
  findMany(selection: CoinSelection, order: CoinOrder, page?: PageOptions): Promise<Coin[]>;
  count(selection: CoinSelection): Promise<number>;
  findById(coinId: string): Promise<Coin | null>;
  findByIds(coinIds: readonly string[]): Promise<Coin[]>;
  getStats(): Promise<CatalogStats>;
  /** Distinct non-empty countries, ascending */
  findCountries(): Promise<string[]>;
  /** Distinct face values, descending */
  findDenominations(): Promise<number[]>;
  /** Distinct series starting with the prefix, ascending */
  findSeriesWithPrefix(prefix: string): Promise<string[]>;
  /** Batched inserts in one transaction: all rows or none */
  insertMany(coins: readonly Coin[]): Promise<number>;
  deleteAll(): Promise<number>;
}

export class DrizzleCatalogRepository implements CatalogRepository {
  constructor(private db: Database) {}

  async findMany(selection: CoinSelection, order: CoinOrder, page?: PageOptions): Promise<Coin[]> {
    if (selection.coinIds?.length === 0) {
      return [];
    }

    return runStoreOperation('catalog.findMany', async () => {
      let query = this.db
        .select()
        .from(catalog)
        .where(this.buildWhere(selection))
        .orderBy(...this.buildOrder(order))
        .$dynamic();

      if (page) {
        query = query.limit(page.limit).offset(page.offset);
      }

      const rows = await query;
      return rows.map(toCoin);
    });
  }

  async count(selection: CoinSelection): Promise<number> {
    if (selection.coinIds?.length === 0) {
      return 0;
    }

    return runStoreOperation('catalog.count', async () => {
      const [row] = await this.db
        .select({ total: count() })
        .from(catalog)
        .where(this.buildWhere(selection));
      return row?.total ?? 0;
    });
  }

  async findById(coinId: string): Promise<Coin | null> {
    return runStoreOperation('catalog.findById', async () => {
      const [row] = await this.db.select().from(catalog).where(eq(catalog.coinId, coinId)).limit(1);
      return row ? toCoin(row) : null;
    });
  }

  async findByIds(coinIds: readonly string[]): Promise<Coin[]> {
    if (coinIds.length === 0) {
      return [];
    }

    return runStoreOperation('catalog.findByIds', async () => {
      const coins: Coin[] = [];
      for (const batch of chunkForStatement([...new Set(coinIds)], 1)) {
        const rows = await this.db.select().from(catalog).where(inArray(catalog.coinId, batch));
        coins.push(...rows.map(toCoin));
      }
      return coins;
    });
  }

  async getStats(): Promise<CatalogStats> {
    return runStoreOperation('catalog.getStats', async () => {
      const [row] = await this.db
        .select({
          totalCoins: count(),
          totalCountries: countDistinct(catalog.country),
          regularCoins: sql<number>`count(*) filter (where ${catalog.coinType} = 'RE')`.mapWith(Number),
          commemorativeCoins: sql<number>`count(*) filter (where ${catalog.coinType} = 'CC')`.mapWith(Number),
        })
        .from(catalog);

      return {
        totalCoins: row?.totalCoins ?? 0,
        totalCountries: row?.totalCountries ?? 0,
        regularCoins: row?.regularCoins ?? 0,
        commemorativeCoins: row?.commemorativeCoins ?? 0,
      };
    });
  }

  async findCountries(): Promise<string[]> {
    return runStoreOperation('catalog.findCountries', async () => {
      const rows = await this.db
        .selectDistinct({ country: catalog.country })
        .from(catalog)
        .where(ne(catalog.country, ''))
        .orderBy(asc(catalog.country));
      return rows.map((row) => row.country);
    });
  }

  async findDenominations(): Promise<number[]> {
    return runStoreOperation('catalog.findDenominations', async () => {
      const rows = await this.db
        .selectDistinct({ value: catalog.value })
        .from(catalog)
        .orderBy(desc(catalog.value));
      return rows.map((row) => Number(row.value));
    });
  }

  async findSeriesWithPrefix(prefix: string): Promise<string[]> {
    return runStoreOperation('catalog.findSeriesWithPrefix', async () => {
      const rows = await this.db
        .selectDistinct({ series: catalog.series })
        .from(catalog)
        .where(like(catalog.series, `${escapeLikePattern(prefix)}%`))
        .orderBy(asc(catalog.series));
      return rows.map((row) => row.series);
    });
  }

  async insertMany(coins: readonly Coin[]): Promise<number> {
    if (coins.length === 0) {
      return 0;
    }

    const rows = coins.map((coin) => ({
      coinId: coin.coinId,
      coinType: coin.coinType,
      year: coin.year,
      country: coin.country,
      series: coin.series,
      value: coin.value.toFixed(2),
      imageUrl: coin.imageUrl,
      feature: coin.feature,
      volume: coin.volume,
    }));

    return runStoreOperation('catalog.insertMany', async () =>
      this.db.transaction(async (tx) => {
        for (const batch of chunkForStatement(rows, INSERT_PARAMS_PER_COIN)) {
          await tx.insert(catalog).values(batch);
        }
        return coins.length;
      })
    );
  }

  async deleteAll(): Promise<number> {
    return runStoreOperation('catalog.deleteAll', async () => {
      const deleted = await this.db.delete(catalog).returning({ coinId: catalog.coinId });
      return deleted.length;
    });
  }

  private buildWhere(selection: CoinSelection): SQL | undefined {
    const conditions: SQL[] = [];

    if (selection.coinType) {
      conditions.push(eq(catalog.coinType, selection.coinType));
    }
    if (selection.country) {
      conditions.push(eq(catalog.country, selection.country));
    }
    if (selection.series) {
      conditions.push(eq(catalog.series, selection.series));
    }
    if (selection.year !== undefined) {
      conditions.push(eq(catalog.year, selection.year));
    }
    if (selection.value !== undefined) {
      conditions.push(eq(catalog.value, selection.value.toFixed(2)));
    }
    if (selection.search) {
      const pattern = `%${escapeLikePattern(selection.search)}%`;
      const match = or(
        ilike(catalog.country, pattern),
        ilike(catalog.series, pattern),
        ilike(catalog.feature, pattern)
      );
      if (match) {
        conditions.push(match);
      }
    }
    if (selection.coinIds) {
      conditions.push(inArray(catalog.coinId, [...selection.coinIds]));
    }
    if (selection.excludeCoinIds && selection.excludeCoinIds.length > 0) {
      conditions.push(notInArray(catalog.coinId, [...selection.excludeCoinIds]));
    }

    return and(...conditions);
  }

  private buildOrder(order: CoinOrder): SQL[] {
    if (order === 'export') {
      return [asc(catalog.year), asc(catalog.series), asc(catalog.country), asc(catalog.coinId)];
    }
    return [desc(catalog.year), asc(catalog.country), asc(catalog.series), asc(catalog.coinId)];
  }
}

function toCoin(row: CatalogRow): Coin {
  if (!isCoinType(row.coinType)) {
    throw new Error(`Unknown coin type "${row.coinType}" for coin ${row.coinId}`);
  }

  return {
    coinId: row.coinId,
    coinType: row.coinType,
    year: row.year,
    country: row.country,
    series: row.series,
    value: Number(row.value),
    imageUrl: row.imageUrl,
    feature: row.feature,
    volume: row.volume,
  };
}
