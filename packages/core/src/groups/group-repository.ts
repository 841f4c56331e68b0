/**
 * Group Repository
 *
 * Data access layer for groups and group members.
 * Deletes are soft: rows are deactivated, never removed.
 */

import { and, asc, eq } from 'drizzle-orm';
import { groups, groupUsers, type Database, type GroupRow, type GroupUserRow } from '@eurocoin/database';
import { runStoreOperation } from '../shared/store.js';
import type { Group, GroupMember } from './group-types.js';

export interface GroupRepository {
  /** Active groups ordered by name */
  findActiveGroups(): Promise<Group[]>;
  findActiveByKey(groupKey: string): Promise<Group | null>;
  findActiveById(groupId: string): Promise<Group | null>;
  createGroup(group: Group): Promise<void>;
  updateGroupName(groupId: string, name: string): Promise<void>;
  /**
   * Deactivate a group and all of its members in one transaction
   *
   * @returns Number of members deactivated
   */
  deactivateGroup(groupId: string): Promise<number>;
  /** Active members of an active group, ordered by alias */
  findActiveMembers(groupId: string): Promise<GroupMember[]>;
  /** Active member of an active group, matched by owner name */
  findActiveMember(groupId: string, name: string): Promise<GroupMember | null>;
  createMember(member: GroupMember): Promise<void>;
  updateMemberAlias(memberId: string, alias: string): Promise<void>;
  deactivateMember(memberId: string): Promise<void>;
}

export class DrizzleGroupRepository implements GroupRepository {
  constructor(private db: Database) {}

  async findActiveGroups(): Promise<Group[]> {
    return runStoreOperation('groups.findActiveGroups', async () => {
      const rows = await this.db
        .select()
        .from(groups)
        .where(eq(groups.isActive, true))
        .orderBy(asc(groups.name));
      return rows.map(toGroup);
    });
  }

  async findActiveByKey(groupKey: string): Promise<Group | null> {
    return runStoreOperation('groups.findActiveByKey', async () => {
      const [row] = await this.db
        .select()
        .from(groups)
        .where(and(eq(groups.groupKey, groupKey), eq(groups.isActive, true)))
        .limit(1);
      return row ? toGroup(row) : null;
    });
  }

  async findActiveById(groupId: string): Promise<Group | null> {
    return runStoreOperation('groups.findActiveById', async () => {
      const [row] = await this.db
        .select()
        .from(groups)
        .where(and(eq(groups.id, groupId), eq(groups.isActive, true)))
        .limit(1);
      return row ? toGroup(row) : null;
    });
  }

  async createGroup(group: Group): Promise<void> {
    await runStoreOperation('groups.createGroup', async () => {
      await this.db.insert(groups).values(group);
    });
  }

  async updateGroupName(groupId: string, name: string): Promise<void> {
    await runStoreOperation('groups.updateGroupName', async () => {
      await this.db.update(groups).set({ name }).where(eq(groups.id, groupId));
    });
  }

  async deactivateGroup(groupId: string): Promise<number> {
    return runStoreOperation('groups.deactivateGroup', async () =>
      this.db.transaction(async (tx) => {
        const members = await tx
          .update(groupUsers)
          .set({ isActive: false })
          .where(and(eq(groupUsers.groupId, groupId), eq(groupUsers.isActive, true)))
          .returning({ id: groupUsers.id });
        await tx.update(groups).set({ isActive: false }).where(eq(groups.id, groupId));
        return members.length;
      })
    );
  }

  async findActiveMembers(groupId: string): Promise<GroupMember[]> {
    return runStoreOperation('groups.findActiveMembers', async () => {
      const rows = await this.db
        .select({ member: groupUsers })
        .from(groupUsers)
        .innerJoin(groups, eq(groups.id, groupUsers.groupId))
        .where(
          and(
            eq(groupUsers.groupId, groupId),
            eq(groupUsers.isActive, true),
            eq(groups.isActive, true)
          )
        )
        .orderBy(asc(groupUsers.alias));
      return rows.map((row) => toMember(row.member));
    });
  }

  async findActiveMember(groupId: string, name: string): Promise<GroupMember | null> {
    return runStoreOperation('groups.findActiveMember', async () => {
      const [row] = await this.db
        .select({ member: groupUsers })
        .from(groupUsers)
        .innerJoin(groups, eq(groups.id, groupUsers.groupId))
        .where(
          and(
            eq(groupUsers.groupId, groupId),
            eq(groupUsers.name, name),
            eq(groupUsers.isActive, true),
            eq(groups.isActive, true)
          )
        )
        .limit(1);
      return row ? toMember(row.member) : null;
    });
  }

  async createMember(member: GroupMember): Promise<void> {
    await runStoreOperation('groups.createMember', async () => {
      await this.db.insert(groupUsers).values(member);
    });
  }

  async updateMemberAlias(memberId: string, alias: string): Promise<void> {
    await runStoreOperation('groups.updateMemberAlias', async () => {
      await this.db.update(groupUsers).set({ alias }).where(eq(groupUsers.id, memberId));
    });
  }

  async deactivateMember(memberId: string): Promise<void> {
    await runStoreOperation('groups.deactivateMember', async () => {
      await this.db.update(groupUsers).set({ isActive: false }).where(eq(groupUsers.id, memberId));
    });
  }
}

function toGroup(row: GroupRow): Group {
  return { id: row.id, groupKey: row.groupKey, name: row.name, isActive: row.isActive };
}

function toMember(row: GroupUserRow): GroupMember {
  return {
    id: row.id,
    groupId: row.groupId,
    name: row.name,
    alias: row.alias,
    isActive: row.isActive,
  };
}
