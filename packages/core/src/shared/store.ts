import { logger } from '@eurocoin/observability';
import { DomainError, StoreFailureError } from './errors.js';

const storeLogger = logger.child({ module: 'store' });

/**
 * Run one store adapter call, translating adapter faults into StoreFailureError
 *
 * Domain errors raised inside the operation pass through unchanged.
 *
 * @param operation - Short operation label used in the error and the log line
 * @throws StoreFailureError if the adapter call fails
 */
export async function runStoreOperation<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof DomainError) {
      throw error;
    }
    storeLogger.error({ err: error, operation }, 'Store operation failed');
    throw new StoreFailureError(operation, error);
  }
}

/**
 * Escape LIKE wildcards so user input matches literally
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/** Postgres rejects a statement carrying more bind parameters than this */
export const MAX_BIND_PARAMETERS = 65_535;

/**
 * Split rows into batches small enough for one statement each
 *
 * @param paramsPerRow - Bind parameters each row adds to the statement
 */
export function chunkForStatement<T>(rows: readonly T[], paramsPerRow: number): T[][] {
  const size = Math.max(1, Math.floor(MAX_BIND_PARAMETERS / paramsPerRow));
  const batches: T[][] = [];
  for (let start = 0; start < rows.length; start += size) {
    batches.push(rows.slice(start, start + size));
  }
  return batches;
}
