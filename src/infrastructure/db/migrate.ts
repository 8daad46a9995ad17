import type { Logger } from 'pino';
import { ENTITY_TYPES } from '../../domain/index.js';

/** The part of a postgres.js client the schema runner needs. */
export interface SchemaExecutor {
  unsafe(query: string): PromiseLike<unknown>;
}

const ENTITY_TYPE_LIST = ENTITY_TYPES.map((t) => `'${t}'`).join(', ');

/**
 * RFC 7386 merge patch over jsonb: objects merge key by key (recursively),
 * `null` deletes a key, anything else replaces the target outright.
 */
const MERGE_PATCH_FUNCTION = `
  CREATE OR REPLACE FUNCTION jsonb_merge_patch(target JSONB, patch JSONB)
  RETURNS JSONB
  LANGUAGE plpgsql
  IMMUTABLE
  AS $$
  DECLARE
    result JSONB;
    patch_key TEXT;
    patch_value JSONB;
  BEGIN
    IF patch IS NULL OR jsonb_typeof(patch) <> 'object' THEN
      RETURN patch;
    END IF;
    IF target IS NULL OR jsonb_typeof(target) <> 'object' THEN
      result := '{}'::jsonb;
    ELSE
      result := target;
    END IF;
    FOR patch_key, patch_value IN SELECT key, value FROM jsonb_each(patch) LOOP
      IF jsonb_typeof(patch_value) = 'null' THEN
        result := result - patch_key;
      ELSE
        result := jsonb_set(result, ARRAY[patch_key], jsonb_merge_patch(result -> patch_key, patch_value), true);
      END IF;
    END LOOP;
    RETURN result;
  END;
  $$
`;

/**
 * DDL for both document tables, in dependency order. Every statement is
 * idempotent so the runner can be applied on every deploy.
 * Must stay in step with schema.ts.
 */
export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS entities (
    id          VARCHAR(128)   PRIMARY KEY,
    type        VARCHAR(64)    NOT NULL,
    doc         JSONB          NOT NULL,
    created_at  TIMESTAMPTZ(3) NOT NULL DEFAULT NOW(),
    updated_at  TIMESTAMPTZ(3) NOT NULL DEFAULT NOW(),
    version     INTEGER        NOT NULL DEFAULT 1,
    CONSTRAINT entities_type_check CHECK (type IN (${ENTITY_TYPE_LIST})),
    CONSTRAINT entities_doc_check CHECK (
      jsonb_typeof(doc) = 'object'
      AND coalesce(jsonb_typeof(doc -> 'name'), '') = 'string'
      AND coalesce(jsonb_typeof(doc -> 'metadata'), '') = 'array'
    ),
    CONSTRAINT entities_version_check CHECK (version > 0)
  )`,

  `CREATE TABLE IF NOT EXISTS curations (
    id          VARCHAR(128)   PRIMARY KEY,
    entity_id   VARCHAR(128)   NOT NULL,
    doc         JSONB          NOT NULL,
    created_at  TIMESTAMPTZ(3) NOT NULL DEFAULT NOW(),
    updated_at  TIMESTAMPTZ(3) NOT NULL DEFAULT NOW(),
    version     INTEGER        NOT NULL DEFAULT 1,
    CONSTRAINT curations_entity_id_entities_id_fk FOREIGN KEY (entity_id)
      REFERENCES entities (id) ON DELETE CASCADE,
    CONSTRAINT curations_doc_check CHECK (
      jsonb_typeof(doc) = 'object'
      AND coalesce(jsonb_typeof(doc -> 'curator'), '') = 'object'
      AND coalesce(jsonb_typeof(doc -> 'categories'), '') = 'object'
    ),
    CONSTRAINT curations_version_check CHECK (version > 0)
  )`,

  `CREATE INDEX IF NOT EXISTS idx_entities_type_updated ON entities (type, updated_at DESC)`,
  `CREATE INDEX IF NOT EXISTS idx_entities_created ON entities (created_at DESC)`,
  `CREATE INDEX IF NOT EXISTS idx_curations_entity ON curations (entity_id)`,
  `CREATE INDEX IF NOT EXISTS idx_curations_updated ON curations (updated_at DESC)`,

  // Functional indexes: the expressions match what the query renderer emits.
  `CREATE INDEX IF NOT EXISTS idx_entities_name_lower ON entities (lower(doc ->> 'name'))`,
  `CREATE INDEX IF NOT EXISTS idx_entities_status ON entities ((doc ->> 'status'))`,
  `CREATE INDEX IF NOT EXISTS idx_entities_sync_status ON entities ((doc -> 'sync' ->> 'status'))`,
  `CREATE INDEX IF NOT EXISTS idx_curations_curator ON curations ((doc -> 'curator' ->> 'id'))`,

  MERGE_PATCH_FUNCTION,
];

/**
 * Applies the document-store schema (lightweight migration via raw SQL).
 * drizzle-kit can generate the same tables from schema.ts; this runner
 * also installs the merge-patch function, which drizzle-kit does not model.
 */
export async function ensureSchema(sql: SchemaExecutor, log: Logger): Promise<void> {
  for (const statement of SCHEMA_STATEMENTS) {
    await sql.unsafe(statement);
  }
  log.info({ statements: SCHEMA_STATEMENTS.length }, 'Document store schema ready (entities + curations)');
}
