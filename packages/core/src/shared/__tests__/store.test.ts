import { describe, it, expect } from 'vitest';
import { chunkForStatement, runStoreOperation } from '../store.js';
import { NotFoundError, StoreFailureError } from '../errors.js';

describe('runStoreOperation', () => {
  it('should return the operation result', async () => {
    await expect(runStoreOperation('catalog.count', async () => 42)).resolves.toBe(42);
  });

  it('should wrap adapter faults with the original error as cause', async () => {
    const fault = new Error('connection refused');

    const error = await runStoreOperation('catalog.count', async () => {
      throw fault;
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(StoreFailureError);
    expect(error).toMatchObject({
      name: 'StoreFailureError',
      kind: 'store_failure',
      operation: 'catalog.count',
      message: 'Store operation failed: catalog.count',
      cause: fault,
    });
  });

  it('should let domain errors through unchanged', async () => {
    const notFound = new NotFoundError('Coin not found: X');

    await expect(
      runStoreOperation('catalog.find', async () => {
        throw notFound;
      })
    ).rejects.toBe(notFound);
  });
});

describe('chunkForStatement', () => {
  it('should fit each batch under the bind parameter limit', () => {
    const rows = Array.from({ length: 20_000 }, (_, i) => i);

    const batches = chunkForStatement(rows, 7);

    expect(batches.map((batch) => batch.length)).toEqual([9_362, 9_362, 1_276]);
    expect(batches.flat()).toEqual(rows);
  });

  it('should return no batches for no rows', () => {
    expect(chunkForStatement([], 9)).toEqual([]);
  });
});
