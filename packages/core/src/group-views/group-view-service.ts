/**
 * Group View Service
 *
 * Composes catalog, ledger and group directory into group-scoped views.
 *
 * Invariant: an owner appears in a group view only if their name matches an
 * active member of that group. Ledger lookups here are deliberately broader than
 * the group (all owners of the listed coins), so the membership filter is the
 * step that enforces isolation between groups.
 *
 * A view is either complete or an error: group misses surface as NotFound,
 * every other fault as StoreFailureError.
 */

import { logger as rootLogger, type Logger } from '@eurocoin/observability';
import { MAX_GROUP_PAGE_SIZE } from '@eurocoin/types';
import type { CachedQuery, QueryCache } from '../cache/query-cache.js';
import { CATALOG_TAG, GROUP_TAG, GROUP_VIEW_TAG, OWNERSHIP_TAG, groupTag } from '../cache/cache-tags.js';
import type { CatalogRepository } from '../catalog/catalog-repository.js';
import type { Coin, CoinSelection } from '../catalog/catalog-types.js';
import type { GroupRepository } from '../groups/group-repository.js';
import type { GroupMember } from '../groups/group-types.js';
import { GroupNotFoundError, MemberNotFoundError } from '../groups/group-errors.js';
import type { OwnershipRepository } from '../ownership/ownership-repository.js';
import { attachCoins, resolveCurrentOwnerships } from '../ownership/ownership-resolution.js';
import type { CurrentOwnership } from '../ownership/ownership-types.js';
import { DomainError, StoreFailureError } from '../shared/errors.js';
import { assertPage, type PageOptions } from '../shared/pagination.js';
import type {
  CoinOwner,
  CoinView,
  GroupCoinFilters,
  GroupContext,
  GroupStats,
  MemberHomepage,
} from './group-view-types.js';

const VIEW_TAGS = [GROUP_TAG, OWNERSHIP_TAG, GROUP_VIEW_TAG];

export interface GroupViewServiceOptions {
  logger?: Logger;
}

export class GroupViewService {
  private readonly log: Logger;
  private readonly contexts: CachedQuery<GroupContext>;
  private readonly coinPages: CachedQuery<CoinView[]>;
  private readonly coinOwners: CachedQuery<CoinOwner[]>;
  private readonly homepages: CachedQuery<MemberHomepage>;

  constructor(
    private groupRepo: GroupRepository,
    private catalogRepo: CatalogRepository,
    private ownershipRepo: OwnershipRepository,
    cache: QueryCache,
    options: GroupViewServiceOptions = {}
  ) {
    this.log = (options.logger ?? rootLogger).child({ module: 'group-views' });
    this.contexts = cache.region<GroupContext>('groupViews.context');
    this.coinPages = cache.region<CoinView[]>('groupViews.coins');
    this.coinOwners = cache.region<CoinOwner[]>('groupViews.coinOwners');
    this.homepages = cache.region<MemberHomepage>('groupViews.homepage');
  }

  /**
   * Group, its active members and summary statistics
   *
   * @throws GroupNotFoundError if no active group has this key
   */
  async getGroupContext(groupKey: string): Promise<GroupContext> {
    return this.contexts.getOrCompute({ params: { groupKey }, tags: VIEW_TAGS }, () =>
      this.compose('groupViews.context', async () => {
        const group = await this.groupRepo.findActiveByKey(groupKey);
        if (!group) {
          throw new GroupNotFoundError(groupKey);
        }

        const members = await this.groupRepo.findActiveMembers(group.id);
        const stats = await this.computeStats(members);

        return { id: group.id, name: group.name, groupKey: group.groupKey, members, stats };
      })
    );
  }

  /**
   * One page of catalog coins annotated with their current owners in the group,
   * ordered by year (newest first), then country
   *
   * @throws InvalidPaginationError if the page is unbounded or malformed
   * @throws GroupNotFoundError if the group is missing or inactive
   */
  async getGroupCoins(
    groupId: string,
    filters: GroupCoinFilters,
    page: PageOptions
  ): Promise<CoinView[]> {
    assertPage(page, MAX_GROUP_PAGE_SIZE);

    return this.coinPages.getOrCompute(
      {
        params: { groupId, ...filters, limit: page.limit, offset: page.offset },
        tags: [...VIEW_TAGS, CATALOG_TAG, groupTag(groupId)],
      },
      () =>
        this.compose('groupViews.coins', async () => {
          const members = await this.requireMembersById(groupId);
          const aliases = aliasesByName(members);

          const selection: CoinSelection = {
            coinType: filters.coinType,
            country: filters.country,
            series: filters.series,
            year: filters.year,
            value: filters.value,
          };

          if (filters.ownershipStatus !== undefined || filters.ownedBy !== undefined) {
            const ownedIds = [...(await this.findOwnedCoinIds(members, filters.ownedBy))];
            if (filters.ownershipStatus === 'missing') {
              selection.excludeCoinIds = ownedIds;
            } else {
              selection.coinIds = ownedIds;
            }
          }

          const coins = await this.catalogRepo.findMany(selection, 'listing', page);
          const events = await this.ownershipRepo.findEvents({
            coinIds: coins.map((coin) => coin.coinId),
          });
          const ownersByCoin = this.groupOwnersByCoin(resolveCurrentOwnerships(events), aliases);

          return coins.map((coin) => toCoinView(coin, ownersByCoin.get(coin.coinId) ?? []));
        })
    );
  }

  /**
   * Current owners of one coin among the group's active members
   *
   * @throws GroupNotFoundError if the group is missing or inactive
   */
  async getCoinOwnersInGroup(coinId: string, groupId: string): Promise<CoinOwner[]> {
    return this.coinOwners.getOrCompute(
      { params: { coinId, groupId }, tags: [...VIEW_TAGS, groupTag(groupId)] },
      () =>
        this.compose('groupViews.coinOwners', async () => {
          const members = await this.requireMembersById(groupId);
          const events = await this.ownershipRepo.findEvents({ coinIds: [coinId] });
          const ownersByCoin = this.groupOwnersByCoin(
            resolveCurrentOwnerships(events),
            aliasesByName(members)
          );
          return ownersByCoin.get(coinId) ?? [];
        })
    );
  }

  /**
   * A member's page inside a group: their current coins and collection stats
   *
   * @throws GroupNotFoundError if no active group has this key
   * @throws MemberNotFoundError if the name is not an active member
   */
  async getMemberHomepage(groupKey: string, memberName: string): Promise<MemberHomepage> {
    return this.homepages.getOrCompute(
      { params: { groupKey, memberName }, tags: [...VIEW_TAGS, CATALOG_TAG] },
      () =>
        this.compose('groupViews.homepage', async () => {
          const group = await this.groupRepo.findActiveByKey(groupKey);
          if (!group) {
            throw new GroupNotFoundError(groupKey);
          }

          const member = await this.groupRepo.findActiveMember(group.id, memberName);
          if (!member) {
            throw new MemberNotFoundError(groupKey, memberName);
          }

          const events = await this.ownershipRepo.findEvents({ names: [member.name] });
          const current = resolveCurrentOwnerships(events);
          const coins = attachCoins(
            current,
            await this.catalogRepo.findByIds(current.map((ownership) => ownership.coinId))
          );

          return {
            group: { id: group.id, name: group.name, groupKey: group.groupKey },
            member: { name: member.name, alias: member.alias },
            coins,
            stats: {
              ownedCount: coins.length,
              countries: new Set(coins.map((coin) => coin.country)).size,
              regular: coins.filter((coin) => coin.coinType === 'RE').length,
              commemorative: coins.filter((coin) => coin.coinType === 'CC').length,
            },
          };
        })
    );
  }

  /**
   * @throws GroupNotFoundError if the group is missing or inactive
   */
  async getGroupStats(groupId: string): Promise<GroupStats> {
    return this.compose('groupViews.stats', async () => {
      const members = await this.requireMembersById(groupId);
      return this.computeStats(members);
    });
  }

  private async requireMembersById(groupId: string): Promise<GroupMember[]> {
    const group = await this.groupRepo.findActiveById(groupId);
    if (!group) {
      throw new GroupNotFoundError(groupId);
    }
    return this.groupRepo.findActiveMembers(group.id);
  }

  private async computeStats(members: readonly GroupMember[]): Promise<GroupStats> {
    const names = [...new Set(members.map((member) => member.name))];
    const events = await this.ownershipRepo.findEvents({ names });
    const current = this.keepMembers(resolveCurrentOwnerships(events), aliasesByName(members));

    return {
      totalMembers: names.length,
      totalCoinsOwned: new Set(current.map((ownership) => ownership.coinId)).size,
      totalOwnershipRecords: current.length,
    };
  }

  /**
   * Coin ids currently owned by the group's members, or by one member when `ownedBy` is set
   */
  private async findOwnedCoinIds(
    members: readonly GroupMember[],
    ownedBy: string | undefined
  ): Promise<Set<string>> {
    const scope = ownedBy === undefined ? members : members.filter((member) => member.name === ownedBy);
    if (scope.length === 0) {
      return new Set();
    }

    const events = await this.ownershipRepo.findEvents({ names: scope.map((member) => member.name) });
    const current = this.keepMembers(resolveCurrentOwnerships(events), aliasesByName(scope));
    return new Set(current.map((ownership) => ownership.coinId));
  }

  /**
   * Group current ownerships by coin, keeping only active members and
   * substituting their alias for the ledger name
   */
  private groupOwnersByCoin(
    current: readonly CurrentOwnership[],
    aliases: ReadonlyMap<string, string>
  ): Map<string, CoinOwner[]> {
    const ownersByCoin = new Map<string, CoinOwner[]>();

    for (const ownership of this.keepMembers(current, aliases)) {
      const owners = ownersByCoin.get(ownership.coinId) ?? [];
      owners.push({
        owner: ownership.name,
        alias: aliases.get(ownership.name) ?? ownership.name,
        acquiredDate: ownership.date,
      });
      ownersByCoin.set(ownership.coinId, owners);
    }

    return ownersByCoin;
  }

  private keepMembers(
    current: readonly CurrentOwnership[],
    aliases: ReadonlyMap<string, string>
  ): CurrentOwnership[] {
    const kept = current.filter((ownership) => aliases.has(ownership.name));
    const excluded = current.length - kept.length;
    if (excluded > 0) {
      this.log.debug({ excluded }, 'Excluded owners outside the group');
    }
    return kept;
  }

  private async compose<T>(operation: string, build: () => Promise<T>): Promise<T> {
    try {
      return await build();
    } catch (error) {
      if (error instanceof DomainError) {
        throw error;
      }
      this.log.error({ err: error, operation }, 'Group view composition failed');
      throw new StoreFailureError(operation, error);
    }
  }
}

function aliasesByName(members: readonly GroupMember[]): Map<string, string> {
  return new Map(members.map((member) => [member.name, member.alias]));
}

function toCoinView(coin: Coin, owners: CoinOwner[]): CoinView {
  return { ...coin, owners, isOwned: owners.length > 0, ownerCount: owners.length };
}
