import { DocumentStoreError, isStoreError } from '../domain/index.js';
import type { Curation, JsonObject, JsonValue } from '../domain/index.js';
import type { QueryRunner } from '../infrastructure/db/index.js';
import {
  insertCuration,
  findCurationById,
  mergeCurationDocument,
  deleteCuration,
} from '../infrastructure/db/index.js';
import { createCurationSchema, documentPatchSchemas, expectedVersionSchema } from './document-schema.js';
import type { CreateCurationInput } from './document-schema.js';
import { documentPath } from './query/json-path.js';
import { queryCurations } from './query-documents.js';
import type { QueryOptions } from './query-documents.js';
import { parseOrThrow, runOptions } from './validation.js';
import type { CallOptions, PageParams } from './validation.js';

export type { CreateCurationInput };

/**
 * Create a curation for an existing entity.
 * A missing parent fails with ReferentialViolation, not NotFound.
 */
export async function createCuration(
  runner: QueryRunner,
  input: CreateCurationInput,
  options: CallOptions = {},
): Promise<Curation> {
  const parsed = parseOrThrow(createCurationSchema, input, 'InvalidDocument', 'curation');

  try {
    return await runner.run(
      (db) => insertCuration(db, { id: parsed.id, entityId: parsed.entityId, document: parsed.document }),
      runOptions(options, 'curation.create'),
    );
  } catch (err: unknown) {
    if (isStoreError(err, 'DuplicateKey')) {
      throw new DocumentStoreError('DuplicateKey', `Curation "${parsed.id}" already exists`, { cause: err });
    }
    if (isStoreError(err, 'ReferentialViolation')) {
      throw new DocumentStoreError(
        'ReferentialViolation',
        `Curation "${parsed.id}" references missing entity "${parsed.entityId}"`,
        { cause: err, details: { entityId: parsed.entityId } },
      );
    }
    throw err;
  }
}

export async function getCuration(runner: QueryRunner, id: string, options: CallOptions = {}): Promise<Curation> {
  const curation = await runner.run((db) => findCurationById(db, id), runOptions(options, 'curation.get'));
  if (curation === null) {
    throw new DocumentStoreError('NotFound', `Curation "${id}" not found`);
  }
  return curation;
}

export async function updateCurationMerge(
  runner: QueryRunner,
  id: string,
  patch: JsonObject,
  expectedVersion: number,
  options: CallOptions = {},
): Promise<Curation> {
  const validPatch = parseOrThrow(documentPatchSchemas.curations, patch, 'InvalidDocument', 'curation patch');
  const version = parseOrThrow(expectedVersionSchema, expectedVersion, 'InvalidDocument', 'expected version');

  const result = await runner.run(
    (db) => mergeCurationDocument(db, id, validPatch, version),
    runOptions(options, 'curation.update'),
  );

  switch (result.status) {
    case 'updated':
      return result.curation;
    case 'not-found':
      throw new DocumentStoreError('NotFound', `Curation "${id}" not found`);
    case 'conflict':
      runner.log.warn({ id, expectedVersion: version }, 'Curation version conflict');
      throw new DocumentStoreError('VersionConflict', `Curation "${id}" is no longer at version ${version}`, {
        details: { id, expectedVersion: version },
      });
  }
}

export async function removeCuration(runner: QueryRunner, id: string, options: CallOptions = {}): Promise<boolean> {
  return runner.run((db) => deleteCuration(db, id), runOptions(options, 'curation.delete'));
}

/** Curations of one entity, newest first. */
export async function listCurationsForEntity(
  runner: QueryRunner,
  entityId: string,
  page: PageParams = {},
  options: QueryOptions = {},
): Promise<Curation[]> {
  const result = await queryCurations(runner, {
    filters: [{ path: 'entityId', operator: 'eq', value: entityId }],
    sort: { path: 'createdAt', direction: 'desc' },
    ...page,
  }, options);
  return result.data.map((match) => match.record);
}

/** Curations whose `categories.<category>` array holds `concept`. */
export async function findCurationsByCategoryConcept(
  runner: QueryRunner,
  category: string,
  concept: JsonValue,
  page: PageParams = {},
  options: QueryOptions = {},
): Promise<Curation[]> {
  const result = await queryCurations(runner, {
    filters: [{ path: documentPath('categories', category), operator: 'contains', value: concept }],
    ...page,
  }, options);
  return result.data.map((match) => match.record);
}

export async function findCurationsByCurator(
  runner: QueryRunner,
  curatorId: string,
  page: PageParams = {},
  options: QueryOptions = {},
): Promise<Curation[]> {
  const result = await queryCurations(runner, {
    filters: [{ path: documentPath('curator', 'id'), operator: 'eq', value: curatorId }],
    ...page,
  }, options);
  return result.data.map((match) => match.record);
}
