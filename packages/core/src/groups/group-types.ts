/**
 * Group Directory Types
 */

export interface Group {
  id: string;
  /** URL-safe slug, unique among active groups */
  groupKey: string;
  name: string;
  isActive: boolean;
}

/**
 * Membership of an owner identity in a group. `name` is the join key into the
 * ownership ledger; `alias` replaces it in group-scoped views.
 */
export interface GroupMember {
  id: string;
  groupId: string;
  name: string;
  alias: string;
  isActive: boolean;
}

export interface CreateGroupParams {
  groupKey: string;
  name: string;
}

export interface UpdateGroupParams {
  name: string;
}

export interface AddMemberParams {
  name: string;
  alias: string;
}
