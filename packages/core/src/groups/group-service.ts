/**
 * Group Service
 *
 * Group directory: groups and their members (owner name + group-local alias),
 * independent of ownership. Uniqueness checks read the store directly; reads
 * go through the cache under the `group` tag, which every mutation invalidates.
 */

import { randomUUID } from 'node:crypto';
import { logger as rootLogger, type Logger } from '@eurocoin/observability';
import { GROUP_KEY_PATTERN } from '@eurocoin/types';
import type { CachedQuery, QueryCache } from '../cache/query-cache.js';
import { GROUP_TAG } from '../cache/cache-tags.js';
import type { GroupRepository } from './group-repository.js';
import {
  DuplicateGroupKeyError,
  DuplicateMemberError,
  GroupNotFoundError,
  InvalidGroupKeyError,
  MemberNotFoundError,
} from './group-errors.js';
import type {
  AddMemberParams,
  CreateGroupParams,
  Group,
  GroupMember,
  UpdateGroupParams,
} from './group-types.js';

export interface GroupServiceOptions {
  idGenerator?: () => string;
  logger?: Logger;
}

export class GroupService {
  private readonly generateId: () => string;
  private readonly log: Logger;
  private readonly groupList: CachedQuery<Group[]>;
  private readonly groupByKey: CachedQuery<Group | null>;
  private readonly memberList: CachedQuery<GroupMember[]>;

  constructor(
    private groupRepo: GroupRepository,
    private cache: QueryCache,
    options: GroupServiceOptions = {}
  ) {
    this.generateId = options.idGenerator ?? randomUUID;
    this.log = (options.logger ?? rootLogger).child({ module: 'group-directory' });
    this.groupList = cache.region<Group[]>('groups.list');
    this.groupByKey = cache.region<Group | null>('groups.byKey');
    this.memberList = cache.region<GroupMember[]>('groups.members');
  }

  async listGroups(): Promise<Group[]> {
    return this.groupList.getOrCompute({ tags: [GROUP_TAG] }, () =>
      this.groupRepo.findActiveGroups()
    );
  }

  async getGroupByKey(groupKey: string): Promise<Group | null> {
    return this.groupByKey.getOrCompute({ params: { groupKey }, tags: [GROUP_TAG] }, () =>
      this.groupRepo.findActiveByKey(groupKey)
    );
  }

  /**
   * @throws GroupNotFoundError if no active group has this key
   */
  async requireGroupByKey(groupKey: string): Promise<Group> {
    const group = await this.getGroupByKey(groupKey);
    if (!group) {
      throw new GroupNotFoundError(groupKey);
    }
    return group;
  }

  /** Active members ordered by alias */
  async listMembers(groupId: string): Promise<GroupMember[]> {
    return this.memberList.getOrCompute({ params: { groupId }, tags: [GROUP_TAG] }, () =>
      this.groupRepo.findActiveMembers(groupId)
    );
  }

  async getMember(groupId: string, name: string): Promise<GroupMember | null> {
    const members = await this.listMembers(groupId);
    return members.find((member) => member.name === name) ?? null;
  }

  /**
   * Create a group
   *
   * @throws InvalidGroupKeyError if the key is not a lowercase URL-safe slug
   * @throws DuplicateGroupKeyError if an active group already uses the key
   */
  async createGroup(params: CreateGroupParams): Promise<Group> {
    const groupKey = params.groupKey.trim();
    if (!GROUP_KEY_PATTERN.test(groupKey)) {
      throw new InvalidGroupKeyError(groupKey);
    }

    const existing = await this.groupRepo.findActiveByKey(groupKey);
    if (existing) {
      throw new DuplicateGroupKeyError(groupKey);
    }

    const group: Group = { id: this.generateId(), groupKey, name: params.name.trim(), isActive: true };
    await this.groupRepo.createGroup(group);
    this.invalidate();

    this.log.info({ groupId: group.id, groupKey }, 'Group created');
    return group;
  }

  /**
   * Rename a group
   *
   * @throws GroupNotFoundError if no active group has this key
   */
  async updateGroup(groupKey: string, params: UpdateGroupParams): Promise<Group> {
    const group = await this.findActiveGroup(groupKey);
    const name = params.name.trim();

    await this.groupRepo.updateGroupName(group.id, name);
    this.invalidate();

    return { ...group, name };
  }

  /**
   * Soft-delete a group and every member of it
   *
   * @throws GroupNotFoundError if no active group has this key
   */
  async deleteGroup(groupKey: string): Promise<void> {
    const group = await this.findActiveGroup(groupKey);

    const membersRemoved = await this.groupRepo.deactivateGroup(group.id);
    this.invalidate();

    this.log.info({ groupId: group.id, groupKey, membersRemoved }, 'Group deactivated');
  }

  /**
   * @throws GroupNotFoundError if no active group has this key
   * @throws DuplicateMemberError if the name is already an active member
   */
  async addMember(groupKey: string, params: AddMemberParams): Promise<GroupMember> {
    const group = await this.findActiveGroup(groupKey);
    const name = params.name.trim();

    const existing = await this.groupRepo.findActiveMember(group.id, name);
    if (existing) {
      throw new DuplicateMemberError(groupKey, name);
    }

    const member: GroupMember = {
      id: this.generateId(),
      groupId: group.id,
      name,
      alias: params.alias.trim(),
      isActive: true,
    };
    await this.groupRepo.createMember(member);
    this.invalidate();

    this.log.info({ groupId: group.id, member: name }, 'Group member added');
    return member;
  }

  /**
   * @throws GroupNotFoundError if no active group has this key
   * @throws MemberNotFoundError if the name is not an active member
   */
  async updateMemberAlias(groupKey: string, name: string, alias: string): Promise<GroupMember> {
    const member = await this.findActiveMember(groupKey, name);
    const trimmed = alias.trim();

    await this.groupRepo.updateMemberAlias(member.id, trimmed);
    this.invalidate();

    return { ...member, alias: trimmed };
  }

  /**
   * Soft-delete a membership. The member's ledger events are untouched.
   *
   * @throws GroupNotFoundError if no active group has this key
   * @throws MemberNotFoundError if the name is not an active member
   */
  async removeMember(groupKey: string, name: string): Promise<void> {
    const member = await this.findActiveMember(groupKey, name);

    await this.groupRepo.deactivateMember(member.id);
    this.invalidate();

    this.log.info({ groupId: member.groupId, member: name }, 'Group member removed');
  }

  private async findActiveGroup(groupKey: string): Promise<Group> {
    const group = await this.groupRepo.findActiveByKey(groupKey);
    if (!group) {
      throw new GroupNotFoundError(groupKey);
    }
    return group;
  }

  private async findActiveMember(groupKey: string, name: string): Promise<GroupMember> {
    const group = await this.findActiveGroup(groupKey);
    const member = await this.groupRepo.findActiveMember(group.id, name);
    if (!member) {
      throw new MemberNotFoundError(groupKey, name);
    }
    return member;
  }

  private invalidate(): void {
    this.cache.invalidateTags([GROUP_TAG]);
  }
}
