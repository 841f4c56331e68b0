/**
 * Groups Domain
 *
 * Exports group repository, service, errors, and types.
 */

export { DrizzleGroupRepository } from './group-repository.js';
export type { GroupRepository } from './group-repository.js';

export { GroupService } from './group-service.js';
export type { GroupServiceOptions } from './group-service.js';

export {
  GroupNotFoundError,
  MemberNotFoundError,
  DuplicateGroupKeyError,
  DuplicateMemberError,
  InvalidGroupKeyError,
} from './group-errors.js';

export type {
  Group,
  GroupMember,
  CreateGroupParams,
  UpdateGroupParams,
  AddMemberParams,
} from './group-types.js';
