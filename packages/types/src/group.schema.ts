/**
 * Group directory schemas
 * Groups, group members (aliases) and the group-scoped coin listing
 */

import { z } from 'zod';
import { CoinTypeSchema } from './coin.schema.js';

/**
 * URL-safe group slug: lowercase letters, digits, '-' and '_' (max 64 chars)
 */
export const GROUP_KEY_PATTERN = /^[a-z0-9][a-z0-9_-]{0,63}$/;

export const MAX_GROUP_PAGE_SIZE = 500;

export const GroupKeySchema = z
  .string()
  .trim()
  .regex(GROUP_KEY_PATTERN, 'Group key must be a lowercase URL-safe slug');

export const CreateGroupRequestSchema = z.object({
  groupKey: GroupKeySchema,
  name: z.string().trim().min(1, 'Group name is required').max(100),
});

export const UpdateGroupRequestSchema = z.object({
  name: z.string().trim().min(1, 'Group name is required').max(100),
});

export const AddMemberRequestSchema = z.object({
  name: z.string().trim().min(1, 'Member name is required').max(100),
  alias: z.string().trim().min(1, 'Member alias is required').max(100),
});

export const UpdateMemberRequestSchema = z.object({
  alias: z.string().trim().min(1, 'Member alias is required').max(100),
});

export const OwnershipStatusSchema = z.enum(['owned', 'missing']);

/**
 * Query schema for the group-scoped coin listing
 * Pagination is mandatory: limit defaults to 100 and is capped at 500
 */
export const GroupCoinsQuerySchema = z.object({
  coinType: CoinTypeSchema.optional(),
  country: z.string().trim().min(1).optional(),
  series: z.string().trim().min(1).optional(),
  year: z.coerce.number().int().optional(),
  value: z.coerce.number().positive().optional(),
  ownedBy: z.string().trim().min(1).optional(),
  ownershipStatus: OwnershipStatusSchema.optional(),
  limit: z.coerce.number().int().min(1).max(MAX_GROUP_PAGE_SIZE).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export type CreateGroupRequest = z.infer<typeof CreateGroupRequestSchema>;
export type UpdateGroupRequest = z.infer<typeof UpdateGroupRequestSchema>;
export type AddMemberRequest = z.infer<typeof AddMemberRequestSchema>;
export type UpdateMemberRequest = z.infer<typeof UpdateMemberRequestSchema>;
export type OwnershipStatus = z.infer<typeof OwnershipStatusSchema>;
export type GroupCoinsQuery = z.infer<typeof GroupCoinsQuerySchema>;
