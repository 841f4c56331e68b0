/**
 * Ownership ledger schemas
 * Acquisition/removal requests, owner-scoped queries and history imports
 */

import { z } from 'zod';

const ownerName = z
  .string()
  .trim()
  .min(1, 'Owner name is required')
  .max(100, 'Owner name must be 100 characters or less');

const coinId = z.string().trim().min(1, 'Coin id is required');

/**
 * Request schema for recording an acquisition
 * - date: ISO 8601 effective acquisition timestamp
 */
export const AddOwnershipRequestSchema = z.object({
  name: ownerName,
  coinId,
  date: z.coerce.date(),
  createdBy: z.string().trim().min(1).max(100).optional(),
});

/**
 * Request schema for recording a removal (defaults to now)
 */
export const RemoveOwnershipRequestSchema = z.object({
  name: ownerName,
  coinId,
  removalDate: z.coerce.date().optional(),
  createdBy: z.string().trim().min(1).max(100).optional(),
});

/**
 * Optional group scope for owner and coin lookups
 */
export const GroupScopeQuerySchema = z.object({
  groupId: z.string().uuid().optional(),
});

/**
 * Query schema for the paginated ledger listing
 * - month: YYYY-MM
 */
export const HistoryListQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(500).default(50),
  search: z.string().trim().min(1).optional(),
  name: z.string().trim().min(1).optional(),
  month: z
    .string()
    .regex(/^\d{4}-(0[1-9]|1[0-2])$/, 'Month must use the YYYY-MM format')
    .optional(),
});

export const HistoryExportQuerySchema = z.object({
  name: z.string().trim().min(1).optional(),
});

/**
 * Request schema for importing the history rows selected after classification
 */
export const ImportHistoryRequestSchema = z.object({
  entries: z
    .array(
      z.object({
        name: ownerName,
        coinId,
        date: z.coerce.date(),
      })
    )
    .min(1, 'No history entries selected for import'),
  createdBy: z.string().trim().min(1).max(100).optional(),
});

export type AddOwnershipRequest = z.infer<typeof AddOwnershipRequestSchema>;
export type RemoveOwnershipRequest = z.infer<typeof RemoveOwnershipRequestSchema>;
export type GroupScopeQuery = z.infer<typeof GroupScopeQuerySchema>;
export type HistoryListQuery = z.infer<typeof HistoryListQuerySchema>;
export type ImportHistoryRequest = z.infer<typeof ImportHistoryRequestSchema>;
