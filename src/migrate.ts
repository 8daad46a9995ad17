import pino from 'pino';
import { loadStoreConfig } from './infrastructure/config.js';
import { createDbClient, ensureSchema } from './infrastructure/db/index.js';

/**
 * Standalone process that applies the document-store schema and exits.
 *
 * Safe to run on every deploy: every statement is idempotent.
 */
const config = loadStoreConfig();
const log = pino({ level: config.logLevel });

const { sql } = createDbClient({
  databaseUrl: config.databaseUrl,
  poolSize: 1,
  idleTimeoutSeconds: config.idleTimeoutSeconds,
  connectTimeoutSeconds: config.connectTimeoutSeconds,
  statementTimeoutMs: config.queryTimeoutMs,
});

async function main(): Promise<void> {
  try {
    await ensureSchema(sql, log);
  } finally {
    await sql.end({ timeout: 5 });
  }
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Schema migration failed');
  process.exit(1);
});
