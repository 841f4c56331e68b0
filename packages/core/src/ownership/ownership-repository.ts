/**
 * Ownership Repository
 *
 * Data access layer for the append-only history table.
 * Only inserts, reads and the full reset; events are never updated.
 */

import { and, asc, count, desc, gte, ilike, inArray, lt, ne, or, sql, type SQL } from 'drizzle-orm';
import { history, type Database, type HistoryRow } from '@eurocoin/database';
import { chunkForStatement, escapeLikePattern, runStoreOperation } from '../shared/store.js';
import type { EventFilter, EventPage, EventPageQuery, OwnershipEvent } from './ownership-types.js';

// Every history column is bound on insert
const INSERT_PARAMS_PER_EVENT = 7;
// Coin id and name lists share one statement, so each gets half the parameter budget
const LOOKUP_PARAMS_PER_VALUE = 2;

export interface OwnershipRepository {
  findEvents(filter: EventFilter): Promise<OwnershipEvent[]>;
  append(event: OwnershipEvent): Promise<void>;
  /** Batched inserts in one transaction: all events or none */
  appendMany(events: readonly OwnershipEvent[]): Promise<number>;
  /** Events ordered by date desc, createdAt desc */
  findPage(query: EventPageQuery): Promise<EventPage>;
  /** Distinct non-empty owner names, ascending */
  findDistinctNames(): Promise<string[]>;
  deleteAll(): Promise<number>;
}

export class DrizzleOwnershipRepository implements OwnershipRepository {
  constructor(private db: Database) {}

  async findEvents(filter: EventFilter): Promise<OwnershipEvent[]> {
    if (filter.coinIds?.length === 0 || filter.names?.length === 0) {
      return [];
    }

    const coinBatches = filter.coinIds ? toLookupBatches(filter.coinIds) : [null];
    const nameBatches = filter.names ? toLookupBatches(filter.names) : [null];

    return runStoreOperation('history.findEvents', async () => {
      const events: OwnershipEvent[] = [];
      for (const coinIds of coinBatches) {
        for (const names of nameBatches) {
          const conditions: SQL[] = [];
          if (coinIds) {
            conditions.push(inArray(history.coinId, coinIds));
          }
          if (names) {
            conditions.push(inArray(history.name, names));
          }

          const rows = await this.db
            .select()
            .from(history)
            .where(and(...conditions));
          events.push(...rows.map(toEvent));
        }
      }
      return events;
    });
  }

  async append(event: OwnershipEvent): Promise<void> {
    await runStoreOperation('history.append', async () => {
      await this.db.insert(history).values(event);
    });
  }

  async appendMany(events: readonly OwnershipEvent[]): Promise<number> {
    if (events.length === 0) {
      return 0;
    }

    return runStoreOperation('history.appendMany', async () =>
      this.db.transaction(async (tx) => {
        for (const batch of chunkForStatement(events, INSERT_PARAMS_PER_EVENT)) {
          await tx.insert(history).values(batch);
        }
        return events.length;
      })
    );
  }

  async findPage(query: EventPageQuery): Promise<EventPage> {
    return runStoreOperation('history.findPage', async () => {
      const where = this.buildPageWhere(query);

      const [rows, totals] = await Promise.all([
        this.db
          .select()
          .from(history)
          .where(where)
          .orderBy(desc(history.date), desc(history.createdAt), asc(history.id))
          .limit(query.limit)
          .offset(query.offset),
        this.db.select({ total: count() }).from(history).where(where),
      ]);

      return { entries: rows.map(toEvent), total: totals[0]?.total ?? 0 };
    });
  }

  async findDistinctNames(): Promise<string[]> {
    return runStoreOperation('history.findDistinctNames', async () => {
      const rows = await this.db
        .selectDistinct({ name: history.name })
        .from(history)
        .where(ne(history.name, ''))
        .orderBy(asc(history.name));
      return rows.map((row) => row.name);
    });
  }

  async deleteAll(): Promise<number> {
    return runStoreOperation('history.deleteAll', async () => {
      const deleted = await this.db.delete(history).returning({ id: history.id });
      return deleted.length;
    });
  }

  private buildPageWhere(query: EventPageQuery): SQL | undefined {
    const conditions: SQL[] = [];

    if (query.search) {
      const pattern = `%${escapeLikePattern(query.search)}%`;
      const match = or(ilike(history.name, pattern), ilike(history.coinId, pattern));
      if (match) {
        conditions.push(match);
      }
    }
    if (query.name) {
      conditions.push(sql`lower(${history.name}) = ${query.name.toLowerCase()}`);
    }
    if (query.from) {
      conditions.push(gte(history.date, query.from));
    }
    if (query.to) {
      conditions.push(lt(history.date, query.to));
    }

    return and(...conditions);
  }
}

function toLookupBatches(values: readonly string[]): string[][] {
  return chunkForStatement([...new Set(values)], LOOKUP_PARAMS_PER_VALUE);
}

function toEvent(row: HistoryRow): OwnershipEvent {
  return {
    id: row.id,
    name: row.name,
    coinId: row.coinId,
    date: row.date,
    createdAt: row.createdAt,
    createdBy: row.createdBy,
    isActive: row.isActive,
  };
}
