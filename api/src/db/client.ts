/**
 * Database Connection Pool
 *
 * Manages PostgreSQL connections using the `postgres` driver
 * with Drizzle ORM for type-safe queries. The pool is created by the
 * container and handed to the store; nothing imports a module-level pool.
 */

import postgres from 'postgres';
import { drizzle } from 'drizzle-orm/postgres-js';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import * as schema from './schema';

/**
 * Any drizzle Postgres database over this schema. Production uses
 * postgres-js; the store tests run the same queries on an embedded driver.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export interface DatabaseHandle {
  db: Database;
  /**
   * Close the connection pool. Used during graceful shutdown.
   */
  close(): Promise<void>;
}

export function createDatabase(options: {
  url: string;
  poolSize: number;
  ssl: boolean;
}): DatabaseHandle {
  const sql = postgres(options.url, {
    max: options.poolSize,
    idle_timeout: 20, // Close idle connections after 20 seconds
    connect_timeout: 10,
    ssl: options.ssl ? 'require' : false,
  });

  const db = drizzle(sql, { schema });

  return {
    db,
    async close() {
      await sql.end();
    },
  };
}
