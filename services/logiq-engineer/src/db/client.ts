import pg from 'pg';
import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as schema from './schema.js';

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  pool: pg.Pool;
  db: Database;
  close(): Promise<void>;
}

/**
 * Create the connection pool and the drizzle query builder on top of it.
 */
export function createDatabase(connectionString: string): DatabaseHandle {
  const pool = new pg.Pool({ connectionString, max: 10 });

  pool.on('error', (error) => {
    console.error('Idle PostgreSQL client error:', error.message);
  });

  const db = drizzle(pool, { schema });

  return {
    pool,
    db,
    close: () => pool.end(),
  };
}
