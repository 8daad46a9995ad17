import { sql, type SQL } from 'drizzle-orm';
import { z } from 'zod';
import type { DocumentKind, JsonObject } from '../../domain/index.js';
import type { Database } from './client.js';

const RETURNED_COLUMNS: Record<DocumentKind, readonly string[]> = {
  entities: ['id', 'type', 'doc', 'created_at', 'updated_at', 'version'],
  curations: ['id', 'entity_id', 'doc', 'created_at', 'updated_at', 'version'],
};

/**
 * Compare-and-swap merge of a document.
 *
 * The UPDATE only matches when `version` still equals the expected value.
 * The outer SELECT always yields exactly one row: `found` says whether the
 * id exists at all, and the record columns are NULL when nothing was
 * updated, which separates "missing" from "stale" without a second
 * round trip.
 */
export function mergeStatement(table: DocumentKind, id: string, patch: JsonObject, expectedVersion: number): SQL {
  const columns = sql.join(RETURNED_COLUMNS[table].map((name) => sql.identifier(name)), sql.raw(', '));
  const tableName = sql.identifier(table);
  return sql`with ${sql.identifier('updated')} as (update ${tableName} set ${sql.identifier('doc')} = jsonb_merge_patch(${sql.identifier('doc')}, ${JSON.stringify(patch)}::jsonb), ${sql.identifier('version')} = ${sql.identifier('version')} + 1, ${sql.identifier('updated_at')} = greatest(date_trunc('milliseconds', now()), ${sql.identifier('updated_at')} + interval '1 millisecond') where ${sql.identifier('id')} = ${id} and ${sql.identifier('version')} = ${expectedVersion} returning ${columns}) select exists(select 1 from ${tableName} where ${sql.identifier('id')} = ${id}) as ${sql.identifier('found')}, ${sql.identifier('updated')}.* from (select 1) as ${sql.identifier('probe')} left join ${sql.identifier('updated')} on true`;
}

export type MergeOutcome =
  | { readonly status: 'updated'; readonly row: Record<string, unknown> }
  | { readonly status: 'not-found' }
  | { readonly status: 'conflict' };

const probeSchema = z.object({
  found: z.boolean(),
  id: z.string().nullable(),
});

export async function executeMerge(
  db: Database,
  table: DocumentKind,
  id: string,
  patch: JsonObject,
  expectedVersion: number,
): Promise<MergeOutcome> {
  const rows = await db.execute(mergeStatement(table, id, patch, expectedVersion));
  const row = rows[0];
  const probe = probeSchema.parse(row);

  if (probe.id !== null && row !== undefined) return { status: 'updated', row };
  return probe.found ? { status: 'conflict' } : { status: 'not-found' };
}
