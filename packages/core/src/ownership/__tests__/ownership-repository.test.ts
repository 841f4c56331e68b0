/**
 * Ownership Repository Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { StoreFailureError } from '../../shared/errors.js';
import { buildEvent } from '../../testing/fixtures.js';
import { RecordingDatabase } from '../../testing/recording-database.js';
import { DrizzleOwnershipRepository } from '../ownership-repository.js';

describe('DrizzleOwnershipRepository', () => {
  let store: RecordingDatabase;
  let repo: DrizzleOwnershipRepository;

  beforeEach(() => {
    store = new RecordingDatabase();
    repo = new DrizzleOwnershipRepository(store.db);
  });

  describe('findEvents', () => {
    it('should map rows to events', async () => {
      store.respond('from "history"', [
        ['event-1', 'anna', 'FRA-1', '2024-02-01T00:00:00.000Z', '2024-02-02T00:00:00.000Z', 'api', false],
      ]);

      const events = await repo.findEvents({ names: ['anna'] });

      expect(events).toEqual([
        buildEvent({
          id: 'event-1',
          name: 'anna',
          coinId: 'FRA-1',
          date: new Date('2024-02-01T00:00:00.000Z'),
          createdAt: new Date('2024-02-02T00:00:00.000Z'),
          isActive: false,
        }),
      ]);
    });

    it('should split long coin id lists so each statement stays under the parameter limit', async () => {
      const coinIds = Array.from({ length: 40_000 }, (_, i) => `C-${i}`);

      await repo.findEvents({ coinIds, names: ['anna'] });

      expect(store.statements.map((statement) => statement.params.length)).toEqual([32_768, 7_234]);
      expect(store.statements[1]?.params[7_233]).toBe('anna');
    });

    it('should not query for an empty coin id or name list', async () => {
      await expect(repo.findEvents({ coinIds: [] })).resolves.toEqual([]);
      await expect(repo.findEvents({ coinIds: ['FRA-1'], names: [] })).resolves.toEqual([]);

      expect(store.statements).toHaveLength(0);
    });
  });

  describe('appendMany', () => {
    it('should bind every column of an event', async () => {
      await repo.appendMany([buildEvent()]);

      expect(store.queries[0]?.params).toEqual([
        'event-1',
        'alice',
        'FRA-2002-RE-1',
        '2024-01-01T00:00:00.000Z',
        '2024-01-01T00:00:00.000Z',
        'api',
        true,
      ]);
    });

    it('should batch large uploads inside one transaction', async () => {
      // Arrange
      const events = Array.from({ length: 9_363 }, (_, i) => buildEvent({ id: `event-${i}` }));

      // Act
      const written = await repo.appendMany(events);

      // Assert
      expect(written).toBe(9_363);
      expect(store.sql[0]).toBe('begin');
      expect(store.sql[store.sql.length - 1]).toBe('commit');
      expect(store.queries.map((query) => query.params.length)).toEqual([65_534, 7]);
    });

    it('should roll back and report a store failure when a batch fails', async () => {
      store.failOn('insert into "history"', new Error('disk full'));

      await expect(repo.appendMany([buildEvent()])).rejects.toBeInstanceOf(StoreFailureError);

      expect(store.sql[store.sql.length - 1]).toBe('rollback');
    });
  });

  describe('findPage', () => {
    it('should page events and count the full match', async () => {
      // Arrange
      store
        .respond('count(*)', [['3']])
        .respond('order by', [
          ['event-1', 'anna', 'FRA-1', '2024-02-01T00:00:00.000Z', '2024-02-01T00:00:00.000Z', 'api', true],
        ]);

      // Act
      const page = await repo.findPage({ name: 'Anna', limit: 10, offset: 20 });

      // Assert
      expect(page.total).toBe(3);
      expect(page.entries.map((entry) => entry.id)).toEqual(['event-1']);
      expect(store.statements.map((statement) => statement.params)).toEqual(
        expect.arrayContaining([['anna', 10, 20], ['anna']])
      );
    });
  });

  it('should count deleted events on reset', async () => {
    store.respond('delete from "history"', [['event-1'], ['event-2']]);

    await expect(repo.deleteAll()).resolves.toBe(2);
  });
});
