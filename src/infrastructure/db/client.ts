import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export interface DbClientOptions {
  databaseUrl: string;
  poolSize: number;
  idleTimeoutSeconds: number;
  connectTimeoutSeconds: number;
  /** Server-side ceiling for any single statement. */
  statementTimeoutMs: number;
}

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * Returns both the raw `sql` connection (for lifecycle management and DDL)
 * and the typed `db` instance (for queries). postgres.js connects lazily,
 * so nothing touches the network until the first statement.
 */
export function createDbClient(options: DbClientOptions) {
  const sql = postgres(options.databaseUrl, {
    max: options.poolSize,
    idle_timeout: options.idleTimeoutSeconds,
    connect_timeout: options.connectTimeoutSeconds,
    connection: {
      application_name: 'curation-document-store',
      statement_timeout: options.statementTimeoutMs,
    },
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type DbClient = ReturnType<typeof createDbClient>;
export type Database = DbClient['db'];
