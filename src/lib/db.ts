import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import type { Pool } from 'pg';
import { schema } from '../db/schema.js';

export type Database = NodePgDatabase<typeof schema>;

let pool: Pool | null = null;
let database: Database | null = null;

/**
 * Get the drizzle client singleton. The pool opens connections lazily,
 * on the first query.
 */
export function getDatabase(connectionString: string): Database {
  if (database) {
    return database;
  }

  pool = new pg.Pool({ connectionString, max: 10 });
  pool.on('error', (err: Error) => {
    console.error('[db] Idle client error:', err.message);
  });

  database = drizzle(pool, { schema });
  return database;
}

export async function checkDatabaseConnection(): Promise<boolean> {
  if (!pool) {
    return false;
  }
  const client = await pool.connect();
  try {
    await client.query('SELECT 1');
    return true;
  } finally {
    client.release();
  }
}

/**
 * Close the pool (for cleanup)
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    database = null;
  }
}
