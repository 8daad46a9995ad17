import type { Curation, Entity, JsonValue } from '../../domain/index.js';
import type { CompiledQuery } from '../../application/query/ast.js';
import type { Database } from './client.js';
import { renderQuery } from './query-renderer.js';
import { decodeCurationRow, decodeEntityRow, decodeExplodedValue } from './row-codec.js';

export interface QueryElement {
  alias: string;
  value: JsonValue;
}

/** One result row: the parent record plus the exploded element, if any. */
export interface QueryMatch<R> {
  record: R;
  element: QueryElement | null;
}

/**
 * Runs a compiled document query as a single read-only statement.
 * Pagination has already been clamped by the compiler.
 */
export async function selectEntities(db: Database, query: CompiledQuery<'entities'>): Promise<QueryMatch<Entity>[]> {
  const rows = await db.execute(renderQuery(query));
  return Array.from(rows, (row) => ({
    record: decodeEntityRow(row),
    element: elementOf(query, row),
  }));
}

export async function selectCurations(db: Database, query: CompiledQuery<'curations'>): Promise<QueryMatch<Curation>[]> {
  const rows = await db.execute(renderQuery(query));
  return Array.from(rows, (row) => ({
    record: decodeCurationRow(row),
    element: elementOf(query, row),
  }));
}

function elementOf(query: CompiledQuery, row: unknown): QueryElement | null {
  return query.explode === null
    ? null
    : { alias: query.explode.alias, value: decodeExplodedValue(row) };
}
