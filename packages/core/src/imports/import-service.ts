/**
 * Import Service
 *
 * Bulk CSV ingestion for the coin catalog and the ownership history.
 * Uploads are parsed and classified against the current store state first;
 * only the rows the caller then selects are written.
 *
 * Catalog writes clear the whole cache (they change filters and stats globally).
 * History writes go through the ledger, which invalidates selectively.
 */

import { logger as rootLogger, type Logger } from '@eurocoin/observability';
import type { QueryCache } from '../cache/query-cache.js';
import type { CatalogRepository } from '../catalog/catalog-repository.js';
import type { Coin } from '../catalog/catalog-types.js';
import type { OwnershipRepository } from '../ownership/ownership-repository.js';
import type { OwnershipService } from '../ownership/ownership-service.js';
import type { HistoryImportEntry } from '../ownership/ownership-types.js';
import {
  parseCoinCsv,
  parseHistoryCsv,
  serializeCoinsCsv,
  serializeHistoryCsv,
} from './csv.js';
import {
  CoinAlreadyExistsError,
  DuplicateCoinInBatchError,
  EmptySelectionError,
} from './import-errors.js';
import type { CoinClassification, HistoryClassification } from './import-types.js';

export interface ImportServiceOptions {
  logger?: Logger;
}

/**
 * Duplicate key for history rows: owner, coin and date to the second
 */
export function historyEntryKey(entry: HistoryImportEntry): string {
  return `${entry.name}\u0000${entry.coinId}\u0000${Math.floor(entry.date.getTime() / 1000)}`;
}

function normalizeFeature(feature: string | null): string {
  return (feature ?? '').trim();
}

export class ImportService {
  private readonly log: Logger;

  constructor(
    private catalogRepo: CatalogRepository,
    private ownershipRepo: OwnershipRepository,
    private ownership: OwnershipService,
    private cache: QueryCache,
    options: ImportServiceOptions = {}
  ) {
    this.log = (options.logger ?? rootLogger).child({ module: 'catalog-import' });
  }

  /**
   * @throws MissingCsvHeadersError if a required header is absent
   * @throws InvalidCsvRowError if a row is malformed
   */
  parseCoinCsv(text: string): Coin[] {
    return parseCoinCsv(text);
  }

  /**
   * @throws MissingCsvHeadersError if a required header is absent
   * @throws InvalidCsvRowError if a row is malformed
   */
  parseHistoryCsv(text: string): HistoryImportEntry[] {
    return parseHistoryCsv(text);
  }

  /**
   * Classify uploaded coins against the catalog
   *
   * - new: id not in the catalog
   * - duplicate: id present with the same feature (empty and missing are equal)
   * - conflict: id present with a different feature; never overwritten
   */
  async classifyCoinUpload(rows: readonly Coin[]): Promise<CoinClassification> {
    const existing = await this.catalogRepo.findByIds([...new Set(rows.map((row) => row.coinId))]);
    const existingById = new Map(existing.map((coin) => [coin.coinId, coin]));

    const classification: CoinClassification = { new: [], duplicate: [], conflict: [] };
    for (const row of rows) {
      const stored = existingById.get(row.coinId);
      if (!stored) {
        classification.new.push(row);
      } else if (normalizeFeature(row.feature) === normalizeFeature(stored.feature)) {
        classification.duplicate.push(row);
      } else {
        classification.conflict.push({ incoming: row, existing: stored });
      }
    }

    this.log.info(
      {
        uploaded: rows.length,
        new: classification.new.length,
        duplicate: classification.duplicate.length,
        conflict: classification.conflict.length,
      },
      'Coin upload classified'
    );
    return classification;
  }

  /**
   * Insert the selected coins in one batch, then clear the cache
   *
   * @returns Number of coins imported
   * @throws EmptySelectionError if nothing is selected
   * @throws DuplicateCoinInBatchError if an id appears more than once
   * @throws CoinAlreadyExistsError if any id is already in the catalog
   */
  async importSelected(rows: readonly Coin[]): Promise<number> {
    if (rows.length === 0) {
      throw new EmptySelectionError('No coins selected for import');
    }

    const seen = new Set<string>();
    const repeated = new Set<string>();
    for (const row of rows) {
      if (seen.has(row.coinId)) {
        repeated.add(row.coinId);
      }
      seen.add(row.coinId);
    }
    if (repeated.size > 0) {
      throw new DuplicateCoinInBatchError([...repeated]);
    }

    const existing = await this.catalogRepo.findByIds([...seen]);
    if (existing.length > 0) {
      throw new CoinAlreadyExistsError(existing.map((coin) => coin.coinId).sort());
    }

    const imported = await this.catalogRepo.insertMany(rows);
    this.cache.clear();

    this.log.info({ imported }, 'Coins imported');
    return imported;
  }

  /**
   * Classify uploaded history rows. A row is a duplicate when an event with the
   * same owner, coin and date (to the second) is stored, or appeared earlier in
   * the same upload.
   */
  async classifyHistoryUpload(rows: readonly HistoryImportEntry[]): Promise<HistoryClassification> {
    const names = [...new Set(rows.map((row) => row.name))];
    const events = await this.ownershipRepo.findEvents({ names });
    const known = new Set(events.map(historyEntryKey));

    const classification: HistoryClassification = { new: [], duplicate: [] };
    for (const row of rows) {
      const key = historyEntryKey(row);
      if (known.has(key)) {
        classification.duplicate.push(row);
      } else {
        known.add(key);
        classification.new.push(row);
      }
    }

    this.log.info(
      {
        uploaded: rows.length,
        new: classification.new.length,
        duplicate: classification.duplicate.length,
      },
      'History upload classified'
    );
    return classification;
  }

  /**
   * Append the selected history rows as acquisitions
   *
   * @returns Number of events written
   * @throws EmptySelectionError if nothing is selected
   */
  async importHistory(rows: readonly HistoryImportEntry[], createdBy?: string): Promise<number> {
    if (rows.length === 0) {
      throw new EmptySelectionError('No history entries selected for import');
    }
    return this.ownership.importBatch(rows, createdBy);
  }

  /**
   * Whole catalog as CSV, ordered by year, series, then country
   */
  async exportCoinsCsv(): Promise<string> {
    const coins = await this.catalogRepo.findMany({}, 'export');
    return serializeCoinsCsv(coins);
  }

  /**
   * Current ownerships as CSV, optionally for one owner
   */
  async exportHistoryCsv(name?: string): Promise<string> {
    const ownerships = await this.ownership.listCurrentOwnerships(name);
    return serializeHistoryCsv(ownerships);
  }

  /**
   * Destructive: delete every catalog coin, then clear the cache
   *
   * @returns Number of coins deleted
   */
  async resetCatalog(): Promise<number> {
    const deleted = await this.catalogRepo.deleteAll();
    this.cache.clear();

    this.log.warn({ deleted }, 'Catalog reset');
    return deleted;
  }
}
