import { eq } from 'drizzle-orm';
import { DocumentStoreError } from '../../domain/index.js';
import type { Entity, EntityType, JsonObject } from '../../domain/index.js';
import type { Database } from './client.js';
import { entities } from './schema.js';
import { decodeEntityRow, toEntity } from './row-codec.js';
import { executeMerge } from './merge-statement.js';

export interface InsertEntityInput {
  id: string;
  type: EntityType;
  document: JsonObject;
}

export type EntityMergeResult =
  | { readonly status: 'updated'; readonly entity: Entity }
  | { readonly status: 'not-found' }
  | { readonly status: 'conflict' };

/**
 * Inserts a new entity at version 1 with identical created/updated
 * timestamps. A duplicate id surfaces as the driver's unique violation.
 */
export async function insertEntity(db: Database, input: InsertEntityInput): Promise<Entity> {
  const now = new Date();
  const [row] = await db.insert(entities).values({
    id: input.id,
    type: input.type,
    doc: input.document,
    created_at: now,
    updated_at: now,
    version: 1,
  }).returning();

  if (row === undefined) {
    throw new DocumentStoreError('StoreUnavailable', `Insert of entity "${input.id}" returned no row`);
  }
  return toEntity(row);
}

/** Returns null when no entity has this id. */
export async function findEntityById(db: Database, id: string): Promise<Entity | null> {
  const rows = await db
    .select()
    .from(entities)
    .where(eq(entities.id, id))
    .limit(1);

  const row = rows[0];
  return row === undefined ? null : toEntity(row);
}

export async function mergeEntityDocument(
  db: Database,
  id: string,
  patch: JsonObject,
  expectedVersion: number,
): Promise<EntityMergeResult> {
  const outcome = await executeMerge(db, 'entities', id, patch, expectedVersion);
  if (outcome.status !== 'updated') return outcome;
  return { status: 'updated', entity: decodeEntityRow(outcome.row) };
}

/** Deletes the entity (and, through the FK, its curations). */
export async function deleteEntity(db: Database, id: string): Promise<boolean> {
  const removed = await db
    .delete(entities)
    .where(eq(entities.id, id))
    .returning({ id: entities.id });

  return removed.length > 0;
}
