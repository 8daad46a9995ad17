import type { Logger } from 'pino';
import type { EntityType, JsonObject, JsonValue } from './domain/index.js';
import {
  createEntity,
  getEntity,
  updateEntityMerge,
  removeEntity,
  listEntitiesByType,
  searchEntitiesByName,
  createCuration,
  getCuration,
  updateCurationMerge,
  removeCuration,
  listCurationsForEntity,
  findCurationsByCategoryConcept,
  findCurationsByCurator,
  executeQuery,
} from './application/index.js';
import type {
  CallOptions,
  CreateCurationInput,
  CreateEntityInput,
  PageParams,
  QueryOptions,
} from './application/index.js';
import type { QueryRequest } from './application/query/index.js';
import { ConnectionPool } from './infrastructure/db/index.js';
import type { StoreConfig } from './infrastructure/config.js';

/**
 * Binds one connection pool, the logger and the configured query limits to
 * every use case. This is the whole public surface a caller needs; the
 * use-case functions stay exported for callers that manage their own pool.
 */
export function createDocumentStore(
  config: StoreConfig,
  log: Logger,
  pool: ConnectionPool = new ConnectionPool(config, log),
) {
  const limits = { defaultLimit: config.queryDefaultLimit, maxLimit: config.queryMaxLimit };
  const withLimits = (options: CallOptions = {}): QueryOptions => ({ ...options, limits });

  const entities = {
    create: (input: CreateEntityInput, options?: CallOptions) => createEntity(pool, input, options),
    getById: (id: string, options?: CallOptions) => getEntity(pool, id, options),
    updateMerge: (id: string, patch: JsonObject, expectedVersion: number, options?: CallOptions) =>
      updateEntityMerge(pool, id, patch, expectedVersion, options),
    delete: (id: string, options?: CallOptions) => removeEntity(pool, id, options),
    listByType: (type: EntityType, page?: PageParams, options?: CallOptions) =>
      listEntitiesByType(pool, type, page, withLimits(options)),
    searchByName: (pattern: string, page?: PageParams, options?: CallOptions) =>
      searchEntitiesByName(pool, pattern, page, withLimits(options)),
  };

  const curations = {
    create: (input: CreateCurationInput, options?: CallOptions) => createCuration(pool, input, options),
    getById: (id: string, options?: CallOptions) => getCuration(pool, id, options),
    updateMerge: (id: string, patch: JsonObject, expectedVersion: number, options?: CallOptions) =>
      updateCurationMerge(pool, id, patch, expectedVersion, options),
    delete: (id: string, options?: CallOptions) => removeCuration(pool, id, options),
    listForEntity: (entityId: string, page?: PageParams, options?: CallOptions) =>
      listCurationsForEntity(pool, entityId, page, withLimits(options)),
    findByCategoryConcept: (category: string, concept: JsonValue, page?: PageParams, options?: CallOptions) =>
      findCurationsByCategoryConcept(pool, category, concept, page, withLimits(options)),
    findByCurator: (curatorId: string, page?: PageParams, options?: CallOptions) =>
      findCurationsByCurator(pool, curatorId, page, withLimits(options)),
  };

  return {
    pool,
    entities,
    curations,
    query: (request: QueryRequest, options?: CallOptions) => executeQuery(pool, request, withLimits(options)),
    close: () => pool.drain(),
  };
}

export type DocumentStore = ReturnType<typeof createDocumentStore>;
