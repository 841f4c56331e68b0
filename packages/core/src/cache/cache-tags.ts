/**
 * Invalidation tags shared by every cached read and write path
 */

export const CATALOG_TAG = 'catalog';
export const OWNERSHIP_TAG = 'ownership';
export const GROUP_TAG = 'group';
export const GROUP_VIEW_TAG = 'group-view';

export function coinTag(coinId: string): string {
  return `coin:${coinId}`;
}

export function ownerTag(name: string): string {
  return `owner:${name}`;
}

export function groupTag(groupId: string): string {
  return `group:${groupId}`;
}
