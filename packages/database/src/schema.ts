/**
 * Catalog store schema
 *
 * Four logical tables:
 * - catalog: immutable coin entries (reimport requires a table reset)
 * - history: append-only ownership ledger; rows are never updated or deleted
 *   outside a full ledger reset
 * - groups / group_users: group directory, soft-deleted through is_active
 *
 * history.coin_id and group_users.name are advisory links with no foreign key:
 * the ledger validates coin ids, and member names are join keys into history.
 */

import {
  pgTable,
  text,
  integer,
  numeric,
  boolean,
  timestamp,
  uuid,
  index,
} from 'drizzle-orm/pg-core';

export const catalog = pgTable(
  'catalog',
  {
    coinId: text('coin_id').primaryKey(),
    coinType: text('coin_type').notNull(),
    year: integer('year').notNull(),
    country: text('country').notNull(),
    series: text('series').notNull(),
    // Face value in euros, two decimals
    value: numeric('value', { precision: 6, scale: 2 }).notNull(),
    imageUrl: text('image_url'),
    feature: text('feature'),
    volume: text('volume'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('catalog_year_country_idx').on(table.year, table.country),
    index('catalog_country_type_idx').on(table.country, table.coinType),
  ]
);

export const history = pgTable(
  'history',
  {
    id: uuid('id').primaryKey(),
    name: text('name').notNull(),
    coinId: text('coin_id').notNull(),
    // Effective acquisition/removal time supplied by the caller
    date: timestamp('date', { withTimezone: true }).notNull(),
    // Server write time; tie-breaker when two events share the same date
    createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
    createdBy: text('created_by').notNull(),
    isActive: boolean('is_active').notNull(),
  },
  (table) => [
    index('history_name_coin_idx').on(table.name, table.coinId),
    index('history_coin_idx').on(table.coinId),
    index('history_date_idx').on(table.date),
  ]
);

export const groups = pgTable(
  'groups',
  {
    id: uuid('id').primaryKey(),
    groupKey: text('group_key').notNull(),
    name: text('name').notNull(),
    isActive: boolean('is_active').notNull().default(true),
  },
  (table) => [index('groups_group_key_idx').on(table.groupKey)]
);

export const groupUsers = pgTable(
  'group_users',
  {
    id: uuid('id').primaryKey(),
    groupId: uuid('group_id').notNull(),
    name: text('name').notNull(),
    alias: text('alias').notNull(),
    isActive: boolean('is_active').notNull().default(true),
  },
  (table) => [
    index('group_users_group_idx').on(table.groupId),
    index('group_users_name_idx').on(table.name),
  ]
);

export type CatalogRow = typeof catalog.$inferSelect;
export type NewCatalogRow = typeof catalog.$inferInsert;
export type HistoryRow = typeof history.$inferSelect;
export type NewHistoryRow = typeof history.$inferInsert;
export type GroupRow = typeof groups.$inferSelect;
export type GroupUserRow = typeof groupUsers.$inferSelect;
