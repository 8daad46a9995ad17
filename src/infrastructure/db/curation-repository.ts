import { eq } from 'drizzle-orm';
import { DocumentStoreError } from '../../domain/index.js';
import type { Curation, JsonObject } from '../../domain/index.js';
import type { Database } from './client.js';
import { curations } from './schema.js';
import { decodeCurationRow, toCuration } from './row-codec.js';
import { executeMerge } from './merge-statement.js';

export interface InsertCurationInput {
  id: string;
  entityId: string;
  document: JsonObject;
}

export type CurationMergeResult =
  | { readonly status: 'updated'; readonly curation: Curation }
  | { readonly status: 'not-found' }
  | { readonly status: 'conflict' };

/**
 * Inserts a curation at version 1. A missing parent entity surfaces as the
 * driver's foreign-key violation.
 */
export async function insertCuration(db: Database, input: InsertCurationInput): Promise<Curation> {
  const now = new Date();
  const [row] = await db.insert(curations).values({
    id: input.id,
    entity_id: input.entityId,
    doc: input.document,
    created_at: now,
    updated_at: now,
    version: 1,
  }).returning();

  if (row === undefined) {
    throw new DocumentStoreError('StoreUnavailable', `Insert of curation "${input.id}" returned no row`);
  }
  return toCuration(row);
}

export async function findCurationById(db: Database, id: string): Promise<Curation | null> {
  const rows = await db
    .select()
    .from(curations)
    .where(eq(curations.id, id))
    .limit(1);

  const row = rows[0];
  return row === undefined ? null : toCuration(row);
}

export async function mergeCurationDocument(
  db: Database,
  id: string,
  patch: JsonObject,
  expectedVersion: number,
): Promise<CurationMergeResult> {
  const outcome = await executeMerge(db, 'curations', id, patch, expectedVersion);
  if (outcome.status !== 'updated') return outcome;
  return { status: 'updated', curation: decodeCurationRow(outcome.row) };
}

export async function deleteCuration(db: Database, id: string): Promise<boolean> {
  const removed = await db
    .delete(curations)
    .where(eq(curations.id, id))
    .returning({ id: curations.id });

  return removed.length > 0;
}
