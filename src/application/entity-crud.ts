import { z } from 'zod';
import { DocumentStoreError, ENTITY_TYPES, isStoreError } from '../domain/index.js';
import type { Entity, EntityType, JsonObject } from '../domain/index.js';
import type { QueryRunner } from '../infrastructure/db/index.js';
import {
  insertEntity,
  findEntityById,
  mergeEntityDocument,
  deleteEntity,
} from '../infrastructure/db/index.js';
import { createEntitySchema, documentPatchSchemas, expectedVersionSchema } from './document-schema.js';
import type { CreateEntityInput } from './document-schema.js';
import { documentPath } from './query/json-path.js';
import { queryEntities } from './query-documents.js';
import type { QueryOptions } from './query-documents.js';
import { parseOrThrow, runOptions } from './validation.js';
import type { CallOptions, PageParams } from './validation.js';

export type { CreateEntityInput };

/**
 * Create a new entity at version 1.
 * Validation runs before the pool is touched.
 */
export async function createEntity(
  runner: QueryRunner,
  input: CreateEntityInput,
  options: CallOptions = {},
): Promise<Entity> {
  const parsed = parseOrThrow(createEntitySchema, input, 'InvalidDocument', 'entity');

  try {
    return await runner.run(
      (db) => insertEntity(db, { id: parsed.id, type: parsed.type, document: parsed.document }),
      runOptions(options, 'entity.create'),
    );
  } catch (err: unknown) {
    if (isStoreError(err, 'DuplicateKey')) {
      throw new DocumentStoreError('DuplicateKey', `Entity "${parsed.id}" already exists`, { cause: err });
    }
    throw err;
  }
}

/** Fetch one entity. Fails with NotFound rather than returning null. */
export async function getEntity(runner: QueryRunner, id: string, options: CallOptions = {}): Promise<Entity> {
  const entity = await runner.run((db) => findEntityById(db, id), runOptions(options, 'entity.get'));
  if (entity === null) {
    throw new DocumentStoreError('NotFound', `Entity "${id}" not found`);
  }
  return entity;
}

/**
 * Merge-patch the entity document if `expectedVersion` is still current.
 * No retry on conflict: the caller re-reads and decides.
 */
export async function updateEntityMerge(
  runner: QueryRunner,
  id: string,
  patch: JsonObject,
  expectedVersion: number,
  options: CallOptions = {},
): Promise<Entity> {
  const validPatch = parseOrThrow(documentPatchSchemas.entities, patch, 'InvalidDocument', 'entity patch');
  const version = parseOrThrow(expectedVersionSchema, expectedVersion, 'InvalidDocument', 'expected version');

  const result = await runner.run(
    (db) => mergeEntityDocument(db, id, validPatch, version),
    runOptions(options, 'entity.update'),
  );

  switch (result.status) {
    case 'updated':
      return result.entity;
    case 'not-found':
      throw new DocumentStoreError('NotFound', `Entity "${id}" not found`);
    case 'conflict':
      runner.log.warn({ id, expectedVersion: version }, 'Entity version conflict');
      throw new DocumentStoreError('VersionConflict', `Entity "${id}" is no longer at version ${version}`, {
        details: { id, expectedVersion: version },
      });
  }
}

/** Delete an entity and its curations. Returns false if it did not exist. */
export async function removeEntity(runner: QueryRunner, id: string, options: CallOptions = {}): Promise<boolean> {
  return runner.run((db) => deleteEntity(db, id), runOptions(options, 'entity.delete'));
}

const entityTypeSchema = z.enum(ENTITY_TYPES);

/** Entities of one type, most recently updated first. */
export async function listEntitiesByType(
  runner: QueryRunner,
  type: EntityType,
  page: PageParams = {},
  options: QueryOptions = {},
): Promise<Entity[]> {
  const validType = parseOrThrow(entityTypeSchema, type, 'InvalidQuery', 'entity type');
  const result = await queryEntities(runner, {
    filters: [{ path: 'type', operator: 'eq', value: validType }],
    sort: { path: 'updatedAt', direction: 'desc' },
    ...page,
  }, options);
  return result.data.map((match) => match.record);
}

/** Case-insensitive substring match on `name`, ordered by name. */
export async function searchEntitiesByName(
  runner: QueryRunner,
  pattern: string,
  page: PageParams = {},
  options: QueryOptions = {},
): Promise<Entity[]> {
  const name = documentPath('name');
  const result = await queryEntities(runner, {
    filters: [{ path: name, operator: 'like', value: pattern }],
    sort: { path: name, direction: 'asc' },
    ...page,
  }, options);
  return result.data.map((match) => match.record);
}
