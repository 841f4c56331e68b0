/**
 * Group Views Domain
 *
 * Group-scoped, ownership-annotated views composed from catalog, ledger and directory.
 */

export { GroupViewService } from './group-view-service.js';
export type { GroupViewServiceOptions } from './group-view-service.js';

export type {
  CoinOwner,
  CoinView,
  GroupCoinFilters,
  GroupContext,
  GroupStats,
  GroupSummary,
  MemberHomepage,
  MemberStats,
} from './group-view-types.js';
