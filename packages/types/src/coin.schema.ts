/**
 * Catalog schemas for coin browsing, admin views and catalog imports
 * Used for request/query validation and type generation
 */

import { z } from 'zod';

/**
 * Coin type codes as stored in the catalog
 * - RE: regular circulation coin
 * - CC: commemorative coin
 */
export const COIN_TYPES = ['RE', 'CC'] as const;

export const CoinTypeSchema = z.enum(COIN_TYPES);

/** Exclusive upper bound on a face value; the store keeps four integer digits and two decimals */
export const MAX_COIN_VALUE = 10_000;

const optionalText = z.string().trim().min(1).optional();

/**
 * Query schema for the public coin listing
 * - limit: 1-100 results per page (default 20)
 */
export const CoinListQuerySchema = z.object({
  coinType: CoinTypeSchema.optional(),
  country: optionalText,
  series: optionalText,
  year: z.coerce.number().int().min(1999).max(2100).optional(),
  value: z.coerce.number().positive().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

/**
 * Query schema for the admin catalog view (search + pagination)
 */
export const AdminCoinQuerySchema = z.object({
  coinType: CoinTypeSchema.optional(),
  country: optionalText,
  search: optionalText,
  limit: z.coerce.number().int().min(1).max(500).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

/**
 * A catalog row as carried between upload classification and import
 */
export const CatalogCoinSchema = z.object({
  coinId: z.string().trim().min(1, 'Coin id is required'),
  coinType: CoinTypeSchema,
  year: z.number().int(),
  country: z.string().trim().min(1),
  series: z.string().trim().min(1),
  value: z.number().positive().lt(MAX_COIN_VALUE),
  imageUrl: z.string().nullable().default(null),
  feature: z.string().nullable().default(null),
  volume: z.string().nullable().default(null),
});

/**
 * Request schema for importing the rows selected after classification
 */
export const ImportCoinsRequestSchema = z.object({
  coins: z.array(CatalogCoinSchema).min(1, 'No coins selected for import'),
});

export type CoinType = z.infer<typeof CoinTypeSchema>;
export type CoinListQuery = z.infer<typeof CoinListQuerySchema>;
export type AdminCoinQuery = z.infer<typeof AdminCoinQuerySchema>;
export type CatalogCoinInput = z.infer<typeof CatalogCoinSchema>;
export type ImportCoinsRequest = z.infer<typeof ImportCoinsRequestSchema>;
