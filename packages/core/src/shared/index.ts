export {
  DomainError,
  NotFoundError,
  ConflictError,
  ValidationError,
  StoreFailureError,
  InvalidPaginationError,
} from './errors.js';
export type { DomainErrorKind } from './errors.js';

export { runStoreOperation, escapeLikePattern, chunkForStatement, MAX_BIND_PARAMETERS } from './store.js';
export { KeyedLock } from './keyed-lock.js';
export { assertPage } from './pagination.js';
export type { PageOptions } from './pagination.js';
