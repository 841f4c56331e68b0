/**
 * Ownership Service
 *
 * The ownership ledger: acquisitions and removals are appended as events and
 * current state is always derived by latest-wins resolution. Writes for one
 * (name, coinId) pair are serialized in-process so the check-then-append cannot
 * interleave; every write invalidates the ownership caches it could affect.
 */

import { randomUUID } from 'node:crypto';
import { logger as rootLogger, type Logger } from '@eurocoin/observability';
import type { CachedQuery, QueryCache } from '../cache/query-cache.js';
import {
  CATALOG_TAG,
  GROUP_TAG,
  GROUP_VIEW_TAG,
  OWNERSHIP_TAG,
  coinTag,
  ownerTag,
} from '../cache/cache-tags.js';
import type { CatalogRepository } from '../catalog/catalog-repository.js';
import { CoinNotFoundError } from '../catalog/catalog-errors.js';
import type { GroupRepository } from '../groups/group-repository.js';
import { KeyedLock } from '../shared/keyed-lock.js';
import { InvalidPaginationError, ValidationError } from '../shared/errors.js';
import type { OwnershipRepository } from './ownership-repository.js';
import { AlreadyOwnedError, NotCurrentlyOwnedError } from './ownership-errors.js';
import {
  attachCoins,
  ownershipKey,
  resolveCurrentOwnerships,
  resolveLatestEvents,
} from './ownership-resolution.js';
import type {
  AddOwnershipParams,
  CurrentOwnership,
  HistoryFilterOptions,
  HistoryImportEntry,
  HistoryPage,
  HistoryQuery,
  OwnedCoin,
  OwnerHistoryEntry,
  OwnershipEvent,
  RemoveOwnershipParams,
} from './ownership-types.js';

export const DEFAULT_CREATED_BY = 'api';
export const DEFAULT_IMPORT_CREATED_BY = 'import';
export const MAX_HISTORY_PAGE_SIZE = 500;

const MONTH_PATTERN = /^(\d{4})-(0[1-9]|1[0-2])$/;

export interface OwnershipServiceOptions {
  now?: () => Date;
  idGenerator?: () => string;
  logger?: Logger;
}

export class OwnershipService {
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly log: Logger;
  private readonly locks = new KeyedLock();
  private lastCreatedAt = 0;

  private readonly currentOwners: CachedQuery<CurrentOwnership[]>;
  private readonly ownedCoins: CachedQuery<OwnedCoin[]>;
  private readonly ownerHistory: CachedQuery<OwnerHistoryEntry[]>;
  private readonly historyPages: CachedQuery<HistoryPage>;
  private readonly historyNames: CachedQuery<string[]>;

  constructor(
    private ownershipRepo: OwnershipRepository,
    private catalogRepo: CatalogRepository,
    private groupRepo: GroupRepository,
    private cache: QueryCache,
    options: OwnershipServiceOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.idGenerator ?? randomUUID;
    this.log = (options.logger ?? rootLogger).child({ module: 'ownership-ledger' });

    this.currentOwners = cache.region<CurrentOwnership[]>('ownership.current');
    this.ownedCoins = cache.region<OwnedCoin[]>('ownership.ownedCoins');
    this.ownerHistory = cache.region<OwnerHistoryEntry[]>('ownership.ownerHistory');
    this.historyPages = cache.region<HistoryPage>('ownership.historyPage');
    this.historyNames = cache.region<string[]>('ownership.names');
  }

  /**
   * Record an acquisition
   *
   * @returns Id of the appended event
   * @throws CoinNotFoundError if the coin is not in the catalog
   * @throws AlreadyOwnedError if the owner currently holds the coin
   */
  async addOwnership(params: AddOwnershipParams): Promise<string> {
    const { name, coinId, date } = params;
    const createdBy = params.createdBy ?? DEFAULT_CREATED_BY;

    const coin = await this.catalogRepo.findById(coinId);
    if (!coin) {
      throw new CoinNotFoundError(coinId);
    }

    return this.locks.run(ownershipKey(name, coinId), async () => {
      const latest = await this.findLatestEvent(name, coinId);
      if (latest?.isActive) {
        throw new AlreadyOwnedError(name, coinId);
      }

      const event = this.buildEvent({ name, coinId, date }, createdBy, true, this.nextCreatedAt());
      await this.ownershipRepo.append(event);
      this.invalidateFor([coinId], [name]);

      this.log.info({ eventId: event.id, owner: name, coinId, createdBy }, 'Ownership added');
      return event.id;
    });
  }

  /**
   * Record a removal
   *
   * @returns Id of the appended event
   * @throws NotCurrentlyOwnedError if the owner does not currently hold the coin
   */
  async removeOwnership(params: RemoveOwnershipParams): Promise<string> {
    const { name, coinId } = params;
    const date = params.removalDate ?? this.now();
    const createdBy = params.createdBy ?? DEFAULT_CREATED_BY;

    return this.locks.run(ownershipKey(name, coinId), async () => {
      const latest = await this.findLatestEvent(name, coinId);
      if (!latest?.isActive) {
        throw new NotCurrentlyOwnedError(name, coinId);
      }

      const event = this.buildEvent({ name, coinId, date }, createdBy, false, this.nextCreatedAt());
      await this.ownershipRepo.append(event);
      this.invalidateFor([coinId], [name]);

      this.log.info({ eventId: event.id, owner: name, coinId, createdBy }, 'Ownership removed');
      return event.id;
    });
  }

  /**
   * Current owners of a coin, optionally restricted to one owner
   */
  async resolveCurrent(coinId: string, name?: string): Promise<CurrentOwnership[]> {
    const tags = [OWNERSHIP_TAG, coinTag(coinId)];
    if (name !== undefined) {
      tags.push(ownerTag(name));
    }

    return this.currentOwners.getOrCompute({ params: { coinId, name }, tags }, async () => {
      const events = await this.ownershipRepo.findEvents({
        coinIds: [coinId],
        names: name === undefined ? undefined : [name],
      });
      return resolveCurrentOwnerships(events);
    });
  }

  /**
   * Coins currently owned by one owner, most recent acquisition first.
   * With a group, nothing is returned unless the owner is an active member of it.
   */
  async resolveOwnedCoins(name: string, groupId?: string): Promise<OwnedCoin[]> {
    return this.ownedCoins.getOrCompute(
      { params: { name, groupId }, tags: this.ownerReadTags(name, groupId) },
      async () => {
        if (!(await this.isInScope(name, groupId))) {
          return [];
        }

        const events = await this.ownershipRepo.findEvents({ names: [name] });
        const current = resolveCurrentOwnerships(events);
        const coins = await this.catalogRepo.findByIds(current.map((ownership) => ownership.coinId));
        return attachCoins(current, coins);
      }
    );
  }

  /**
   * Full ledger replay for one owner (acquisitions and removals),
   * latest write first
   */
  async getOwnerHistory(name: string, groupId?: string): Promise<OwnerHistoryEntry[]> {
    return this.ownerHistory.getOrCompute(
      { params: { name, groupId }, tags: this.ownerReadTags(name, groupId) },
      async () => {
        if (!(await this.isInScope(name, groupId))) {
          return [];
        }

        const events = await this.ownershipRepo.findEvents({ names: [name] });
        const coinIds = [...new Set(events.map((event) => event.coinId))];
        const coins = await this.catalogRepo.findByIds(coinIds);
        const coinsById = new Map(coins.map((coin) => [coin.coinId, coin]));

        return [...events]
          .sort(
            (a, b) =>
              b.createdAt.getTime() - a.createdAt.getTime() || b.date.getTime() - a.date.getTime()
          )
          .map((event) => ({ ...event, coin: coinsById.get(event.coinId) ?? null }));
      }
    );
  }

  /**
   * Paginated raw ledger, newest effective date first
   *
   * @throws InvalidPaginationError if page or limit is out of range
   * @throws ValidationError if month is not YYYY-MM
   */
  async listHistory(query: HistoryQuery): Promise<HistoryPage> {
    const { page, limit } = query;
    if (!Number.isInteger(page) || page < 1) {
      throw new InvalidPaginationError('Page must be a positive integer');
    }
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_HISTORY_PAGE_SIZE) {
      throw new InvalidPaginationError(`Limit must be an integer between 1 and ${MAX_HISTORY_PAGE_SIZE}`);
    }
    const range = query.month === undefined ? undefined : monthRange(query.month);

    return this.historyPages.getOrCompute(
      {
        params: { page, limit, search: query.search, name: query.name, month: query.month },
        tags: [OWNERSHIP_TAG],
      },
      async () => {
        const result = await this.ownershipRepo.findPage({
          search: query.search,
          name: query.name,
          from: range?.from,
          to: range?.to,
          limit,
          offset: (page - 1) * limit,
        });
        return {
          entries: result.entries,
          total: result.total,
          page,
          limit,
          totalPages: Math.ceil(result.total / limit),
        };
      }
    );
  }

  async getHistoryFilterOptions(): Promise<HistoryFilterOptions> {
    const names = await this.historyNames.getOrCompute({ tags: [OWNERSHIP_TAG] }, () =>
      this.ownershipRepo.findDistinctNames()
    );
    return { names };
  }

  /**
   * Current (name, coinId, date) rows, for export. Reads the store directly.
   */
  async listCurrentOwnerships(name?: string): Promise<CurrentOwnership[]> {
    const events = await this.ownershipRepo.findEvents(name === undefined ? {} : { names: [name] });
    return resolveCurrentOwnerships(events);
  }

  /**
   * Bulk append of pre-validated acquisitions
   *
   * All events get fresh ids and strictly increasing write timestamps in input
   * order; the batch is written in one call followed by one invalidation sweep.
   *
   * @returns Number of events written
   */
  async importBatch(
    entries: readonly HistoryImportEntry[],
    createdBy: string = DEFAULT_IMPORT_CREATED_BY
  ): Promise<number> {
    if (entries.length === 0) {
      return 0;
    }

    const events = entries.map((entry) =>
      this.buildEvent(entry, createdBy, true, this.nextCreatedAt())
    );
    const written = await this.ownershipRepo.appendMany(events);

    this.invalidateFor(
      entries.map((entry) => entry.coinId),
      entries.map((entry) => entry.name)
    );

    this.log.info({ count: written, createdBy }, 'Ownership history imported');
    return written;
  }

  /**
   * Destructive: delete every ledger event
   *
   * @returns Number of events deleted
   */
  async resetLedger(): Promise<number> {
    const deleted = await this.ownershipRepo.deleteAll();
    this.cache.invalidateTags([OWNERSHIP_TAG, GROUP_VIEW_TAG]);

    this.log.warn({ deleted }, 'Ownership ledger reset');
    return deleted;
  }

  private async findLatestEvent(name: string, coinId: string): Promise<OwnershipEvent | null> {
    const events = await this.ownershipRepo.findEvents({ coinIds: [coinId], names: [name] });
    return resolveLatestEvents(events).get(ownershipKey(name, coinId)) ?? null;
  }

  private async isInScope(name: string, groupId: string | undefined): Promise<boolean> {
    if (groupId === undefined) {
      return true;
    }
    const member = await this.groupRepo.findActiveMember(groupId, name);
    return member !== null;
  }

  private ownerReadTags(name: string, groupId: string | undefined): string[] {
    const tags = [OWNERSHIP_TAG, CATALOG_TAG, ownerTag(name)];
    if (groupId !== undefined) {
      tags.push(GROUP_TAG);
    }
    return tags;
  }

  private buildEvent(
    entry: HistoryImportEntry,
    createdBy: string,
    isActive: boolean,
    createdAt: Date
  ): OwnershipEvent {
    return {
      id: this.generateId(),
      name: entry.name,
      coinId: entry.coinId,
      date: entry.date,
      createdAt,
      createdBy,
      isActive,
    };
  }

  /**
   * Write timestamps never repeat or go backwards within the process, so two
   * writes with the same effective date are still ordered by write time.
   */
  private nextCreatedAt(): Date {
    const next = Math.max(this.now().getTime(), this.lastCreatedAt + 1);
    this.lastCreatedAt = next;
    return new Date(next);
  }

  private invalidateFor(coinIds: readonly string[], names: readonly string[]): void {
    const tags = new Set([OWNERSHIP_TAG, GROUP_VIEW_TAG]);
    for (const coinId of coinIds) {
      tags.add(coinTag(coinId));
    }
    for (const name of names) {
      tags.add(ownerTag(name));
    }
    this.cache.invalidateTags([...tags]);
  }
}

function monthRange(month: string): { from: Date; to: Date } {
  const match = MONTH_PATTERN.exec(month);
  if (!match) {
    throw new ValidationError('Month must use the YYYY-MM format');
  }
  const year = Number(match[1]);
  const monthIndex = Number(match[2]) - 1;
  return {
    from: new Date(Date.UTC(year, monthIndex, 1)),
    to: new Date(Date.UTC(year, monthIndex + 1, 1)),
  };
}
