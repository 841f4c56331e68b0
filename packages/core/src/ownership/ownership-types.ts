/**
 * Ownership Ledger Types
 */

import type { Coin } from '../catalog/catalog-types.js';

/**
 * One append-only ledger record. `isActive` true records an acquisition,
 * false a removal; rows are never updated.
 */
export interface OwnershipEvent {
  id: string;
  name: string;
  coinId: string;
  /** Effective acquisition or removal time supplied by the caller */
  date: Date;
  /** Server write time */
  createdAt: Date;
  createdBy: string;
  isActive: boolean;
}

/** Resolved current state for one (name, coinId) pair whose latest event is an acquisition */
export interface CurrentOwnership {
  name: string;
  coinId: string;
  date: Date;
}

export interface OwnedCoin extends Coin {
  acquiredDate: Date;
}

export interface OwnerHistoryEntry extends OwnershipEvent {
  /** Null when the event references a coin missing from the catalog */
  coin: Coin | null;
}

export interface AddOwnershipParams {
  name: string;
  coinId: string;
  date: Date;
  createdBy?: string;
}

export interface RemoveOwnershipParams {
  name: string;
  coinId: string;
  /** Defaults to the current time */
  removalDate?: Date;
  createdBy?: string;
}

export interface HistoryImportEntry {
  name: string;
  coinId: string;
  date: Date;
}

export interface HistoryQuery {
  page: number;
  limit: number;
  /** Case-insensitive substring of owner name or coin id */
  search?: string;
  /** Case-insensitive exact owner name */
  name?: string;
  /** YYYY-MM */
  month?: string;
}

export interface HistoryPage {
  entries: OwnershipEvent[];
  total: number;
  page: number;
  limit: number;
  totalPages: number;
}

export interface HistoryFilterOptions {
  names: string[];
}

/** Event lookup: each provided list narrows the result; an empty list matches nothing */
export interface EventFilter {
  coinIds?: readonly string[];
  names?: readonly string[];
}

export interface EventPageQuery {
  search?: string;
  name?: string;
  /** Inclusive lower bound on `date` */
  from?: Date;
  /** Exclusive upper bound on `date` */
  to?: Date;
  limit: number;
  offset: number;
}

export interface EventPage {
  entries: OwnershipEvent[];
  total: number;
}
