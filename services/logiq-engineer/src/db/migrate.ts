import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import pg from 'pg';

const SCHEMA_FILE = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../db/schema.sql');

/**
 * Ensure every table exists before the service starts taking requests.
 *
 * The statements are idempotent (`IF NOT EXISTS`), so this runs on every boot.
 * A failure here is fatal: the routes have nothing to query without tables.
 *
 * @example
 * ```typescript
 * await runDatabaseMigrations(pool);
 * ```
 */
export async function runDatabaseMigrations(pool: pg.Pool, schemaFile: string = SCHEMA_FILE): Promise<void> {
  console.log(`Running database migrations from ${schemaFile}...`);

  const statements = fs.readFileSync(schemaFile, 'utf8');
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    await client.query(statements);
    await client.query('COMMIT');
    console.log('Database migrations completed');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}
