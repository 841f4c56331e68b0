/**
 * Latest-wins resolution over ownership events
 *
 * The current state of a (name, coinId) pair is the `isActive` flag of its
 * chronologically latest event: greatest `date`, then greatest `createdAt`, then
 * greatest `id`. Insertion order is irrelevant; bulk imports write events out of
 * chronological order.
 */

import type { Coin } from '../catalog/catalog-types.js';
import type { CurrentOwnership, OwnedCoin, OwnershipEvent } from './ownership-types.js';

export function ownershipKey(name: string, coinId: string): string {
  return `${name}\u0000${coinId}`;
}

/**
 * Chronological order of two events (negative when `a` happened first)
 */
export function compareEventsChronologically(a: OwnershipEvent, b: OwnershipEvent): number {
  return (
    a.date.getTime() - b.date.getTime() ||
    a.createdAt.getTime() - b.createdAt.getTime() ||
    (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
  );
}

/**
 * Reduce events to the latest one per (name, coinId) pair
 */
export function resolveLatestEvents(events: Iterable<OwnershipEvent>): Map<string, OwnershipEvent> {
  const latest = new Map<string, OwnershipEvent>();

  for (const event of events) {
    const key = ownershipKey(event.name, event.coinId);
    const current = latest.get(key);
    if (!current || compareEventsChronologically(event, current) > 0) {
      latest.set(key, event);
    }
  }

  return latest;
}

/**
 * Current ownerships: pairs whose latest event is an acquisition,
 * most recent acquisition first
 */
export function resolveCurrentOwnerships(events: Iterable<OwnershipEvent>): CurrentOwnership[] {
  const current: CurrentOwnership[] = [];

  for (const event of resolveLatestEvents(events).values()) {
    if (event.isActive) {
      current.push({ name: event.name, coinId: event.coinId, date: event.date });
    }
  }

  return current.sort(
    (a, b) =>
      b.date.getTime() - a.date.getTime() ||
      a.name.localeCompare(b.name) ||
      a.coinId.localeCompare(b.coinId)
  );
}

/**
 * Attach catalog data to current ownerships. Ownerships of coins missing
 * from the catalog are dropped; input order is kept.
 */
export function attachCoins(ownerships: readonly CurrentOwnership[], coins: readonly Coin[]): OwnedCoin[] {
  const coinsById = new Map(coins.map((coin) => [coin.coinId, coin]));
  const owned: OwnedCoin[] = [];

  for (const ownership of ownerships) {
    const coin = coinsById.get(ownership.coinId);
    if (coin) {
      owned.push({ ...coin, acquiredDate: ownership.date });
    }
  }

  return owned;
}
