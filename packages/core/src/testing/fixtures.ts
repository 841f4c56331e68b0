/**
 * Test data builders
 */

import type { Coin } from '../catalog/catalog-types.js';
import type { Group, GroupMember } from '../groups/group-types.js';
import type { OwnershipEvent } from '../ownership/ownership-types.js';

export function buildCoin(overrides: Partial<Coin> = {}): Coin {
  return {
    coinId: 'FRA-2002-RE-1',
    coinType: 'RE',
    year: 2002,
    country: 'France',
    series: 'FRA-01',
    value: 1,
    imageUrl: null,
    feature: null,
    volume: null,
    ...overrides,
  };
}

export function buildEvent(overrides: Partial<OwnershipEvent> = {}): OwnershipEvent {
  return {
    id: 'event-1',
    name: 'alice',
    coinId: 'FRA-2002-RE-1',
    date: new Date('2024-01-01T00:00:00Z'),
    createdAt: new Date('2024-01-01T00:00:00Z'),
    createdBy: 'api',
    isActive: true,
    ...overrides,
  };
}

export function buildGroup(overrides: Partial<Group> = {}): Group {
  return {
    id: 'group-1',
    groupKey: 'family',
    name: 'Family',
    isActive: true,
    ...overrides,
  };
}

export function buildMember(overrides: Partial<GroupMember> = {}): GroupMember {
  return {
    id: 'member-1',
    groupId: 'group-1',
    name: 'alice',
    alias: 'Alice',
    isActive: true,
    ...overrides,
  };
}

/**
 * Sequential ids (`prefix-1`, `prefix-2`, ...) for deterministic assertions
 */
export function sequentialIds(prefix: string): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}
