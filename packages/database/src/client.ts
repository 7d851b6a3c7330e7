import { drizzle } from 'drizzle-orm/node-postgres';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import * as schema from './schema';

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  pool: Pool;
}

export interface CreateDatabaseOptions {
  /** Lambda containers handle one event at a time; keep the pool small. */
  maxConnections?: number;
}

/**
 * Create a drizzle database over a fresh pg pool. Callers should reuse the
 * returned handle across invocations.
 */
export function createDatabase(connectionString: string, options: CreateDatabaseOptions = {}): DatabaseHandle {
  const pool = new Pool({
    connectionString,
    max: options.maxConnections ?? 2,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });
  const db = drizzle(pool, { schema });
  return { db, pool };
}
