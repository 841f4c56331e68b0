/**
 * Group View Types
 */

import type { OwnershipStatus } from '@eurocoin/types';
import type { Coin, CoinFilters } from '../catalog/catalog-types.js';
import type { GroupMember } from '../groups/group-types.js';
import type { OwnedCoin } from '../ownership/ownership-types.js';

export interface GroupStats {
  totalMembers: number;
  /** Distinct coins currently owned by active members */
  totalCoinsOwned: number;
  /** Current (member, coin) ownership pairs */
  totalOwnershipRecords: number;
}

export interface GroupSummary {
  id: string;
  name: string;
  groupKey: string;
}

export interface GroupContext extends GroupSummary {
  members: GroupMember[];
  stats: GroupStats;
}

export interface CoinOwner {
  /** Ledger owner name */
  owner: string;
  /** Group-local display name */
  alias: string;
  acquiredDate: Date;
}

export interface CoinView extends Coin {
  /** Current owners among active members, latest acquisition first */
  owners: CoinOwner[];
  isOwned: boolean;
  ownerCount: number;
}

export interface GroupCoinFilters extends CoinFilters {
  /** Member name; restricts ownership filtering to that member */
  ownedBy?: string;
  ownershipStatus?: OwnershipStatus;
}

export interface MemberStats {
  ownedCount: number;
  countries: number;
  regular: number;
  commemorative: number;
}

export interface MemberHomepage {
  group: GroupSummary;
  member: { name: string; alias: string };
  coins: OwnedCoin[];
  stats: MemberStats;
}
