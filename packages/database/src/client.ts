import pg from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as schema from './schema.js';

const DEV_DATABASE_URL = 'postgresql://localhost:5432/eurocoin';

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseOptions {
  connectionString?: string;
  /** Maximum pooled connections (default 10) */
  poolMax?: number;
}

export interface DatabaseHandle {
  db: Database;
  pool: pg.Pool;
}

/**
 * Create a pooled drizzle client.
 *
 * The pool connects lazily: nothing touches the network until the first query.
 *
 * @example
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const rows = await db.select().from(catalog).where(eq(catalog.country, 'FRA'));
 * ```
 */
export function createDatabase(options: DatabaseOptions = {}): DatabaseHandle {
  const pool = new pg.Pool({
    connectionString: options.connectionString ?? DEV_DATABASE_URL,
    max: options.poolMax ?? 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return { db: wrapClient(pool), pool };
}

/**
 * Bind the catalog schema to an existing pg pool or client.
 * The caller keeps ownership of the connection lifecycle.
 */
export function wrapClient(client: pg.Pool | pg.Client): Database {
  return drizzle(client, { schema });
}

// Process-wide handle for the API; tests build their own or use in-memory repositories
let handle: DatabaseHandle | null = null;

export function getDatabase(options?: DatabaseOptions): DatabaseHandle {
  if (!handle) {
    handle = createDatabase(options);
  }
  return handle;
}

export async function closeDatabase(): Promise<void> {
  if (!handle) {
    return;
  }
  const { pool } = handle;
  handle = null;
  await pool.end();
}
