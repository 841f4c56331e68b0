/**
 * Group Repository Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { StoreFailureError } from '../../shared/errors.js';
import { buildMember } from '../../testing/fixtures.js';
import { RecordingDatabase } from '../../testing/recording-database.js';
import { DrizzleGroupRepository } from '../group-repository.js';

describe('DrizzleGroupRepository', () => {
  let store: RecordingDatabase;
  let repo: DrizzleGroupRepository;

  beforeEach(() => {
    store = new RecordingDatabase();
    repo = new DrizzleGroupRepository(store.db);
  });

  it('should look up active groups by key', async () => {
    const group = await repo.findActiveByKey('family');

    expect(group).toBeNull();
    expect(store.statements[0]?.params).toEqual(['family', true, 1]);
  });

  it('should map joined member rows', async () => {
    store.respond('inner join "groups"', [['member-1', 'group-1', 'alice', 'Alice', true]]);

    const members = await repo.findActiveMembers('group-1');

    expect(members).toEqual([buildMember()]);
    expect(store.statements[0]?.sql).toContain('"groups"."is_active" = $3');
    expect(store.statements[0]?.params).toEqual(['group-1', true, true]);
  });

  describe('deactivateGroup', () => {
    it('should deactivate members and then the group in one transaction', async () => {
      // Arrange
      store.respond('update "group_users"', [['member-1'], ['member-2']]);

      // Act
      const deactivated = await repo.deactivateGroup('group-1');

      // Assert
      expect(deactivated).toBe(2);
      expect(store.sql[0]).toBe('begin');
      expect(store.sql[store.sql.length - 1]).toBe('commit');
      expect(store.queries.map((query) => query.params)).toEqual([
        [false, 'group-1', true],
        [false, 'group-1'],
      ]);
    });

    it('should roll back when the group update fails', async () => {
      store.failOn('update "groups"', new Error('lock timeout'));

      await expect(repo.deactivateGroup('group-1')).rejects.toBeInstanceOf(StoreFailureError);

      expect(store.sql[store.sql.length - 1]).toBe('rollback');
    });
  });
});
