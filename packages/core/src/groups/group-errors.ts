/**
 * Group Directory Errors
 */

import { ConflictError, NotFoundError, ValidationError } from '../shared/errors.js';

export class GroupNotFoundError extends NotFoundError {
  constructor(groupKeyOrId: string) {
    super(`Group not found: ${groupKeyOrId}`);
  }
}

export class MemberNotFoundError extends NotFoundError {
  constructor(groupKey: string, name: string) {
    super(`${name} is not a member of group ${groupKey}`);
  }
}

export class DuplicateGroupKeyError extends ConflictError {
  constructor(groupKey: string) {
    super(`Group key "${groupKey}" is already in use`);
  }
}

export class DuplicateMemberError extends ConflictError {
  constructor(groupKey: string, name: string) {
    super(`${name} is already a member of group ${groupKey}`);
  }
}

export class InvalidGroupKeyError extends ValidationError {
  constructor(groupKey: string) {
    super(
      `Invalid group key "${groupKey}": use lowercase letters, digits, "-" or "_" (max 64 characters)`
    );
  }
}
