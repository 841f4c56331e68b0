/**
 * Ownership Domain
 *
 * Exports the ledger repository, service, resolution helpers, errors, and types.
 */

export { DrizzleOwnershipRepository } from './ownership-repository.js';
export type { OwnershipRepository } from './ownership-repository.js';

export {
  OwnershipService,
  DEFAULT_CREATED_BY,
  DEFAULT_IMPORT_CREATED_BY,
  MAX_HISTORY_PAGE_SIZE,
} from './ownership-service.js';
export type { OwnershipServiceOptions } from './ownership-service.js';

export {
  attachCoins,
  compareEventsChronologically,
  ownershipKey,
  resolveCurrentOwnerships,
  resolveLatestEvents,
} from './ownership-resolution.js';

export { AlreadyOwnedError, NotCurrentlyOwnedError } from './ownership-errors.js';

export type {
  AddOwnershipParams,
  CurrentOwnership,
  EventFilter,
  EventPage,
  EventPageQuery,
  HistoryFilterOptions,
  HistoryImportEntry,
  HistoryPage,
  HistoryQuery,
  OwnedCoin,
  OwnerHistoryEntry,
  OwnershipEvent,
  RemoveOwnershipParams,
} from './ownership-types.js';
