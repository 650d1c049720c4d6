import postgres from 'postgres';
import { config } from '../config';

/**
 * PostgreSQL connection pool.
 *
 * Used by:
 * - PostgresSearchBackend (pgvector + full-text queries over `chunks`)
 * - QueryRunRepository (run records behind the evaluation routes)
 *
 * postgres.js connects lazily, so importing this module opens no socket.
 */

const sql = postgres({
  host: config.database.host,
  port: config.database.port,
  database: config.database.database,
  user: config.database.user,
  password: config.database.password,
  max: 20, // Maximum pool size
  idle_timeout: 20,
  connect_timeout: 10,
});

export { sql };
export type Sql = typeof sql;

/**
 * Health check: verify database connectivity.
 */
export async function checkDatabaseHealth(db: Sql = sql): Promise<boolean> {
  try {
    await db`SELECT 1`;
    return true;
  } catch {
    return false;
  }
}

export async function closeDatabase(): Promise<void> {
  await sql.end({ timeout: 5 });
}
