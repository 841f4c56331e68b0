import { InvalidPaginationError } from './errors.js';

export interface PageOptions {
  limit: number;
  offset: number;
}

/**
 * Reject unbounded or malformed pages
 *
 * @throws InvalidPaginationError if limit is outside 1..maxLimit or offset is negative
 */
export function assertPage(page: PageOptions, maxLimit: number): void {
  if (!Number.isInteger(page.limit) || page.limit < 1 || page.limit > maxLimit) {
    throw new InvalidPaginationError(`Limit must be an integer between 1 and ${maxLimit}`);
  }
  if (!Number.isInteger(page.offset) || page.offset < 0) {
    throw new InvalidPaginationError('Offset must be a non-negative integer');
  }
}
