export { createDocumentStore } from './store.js';
export type { DocumentStore } from './store.js';

export {
  DocumentStoreError,
  isStoreError,
  isCallerError,
  ENTITY_TYPES,
  REQUIRED_KEYS,
} from './domain/index.js';
export type {
  StoreErrorKind,
  Entity,
  EntityType,
  Curation,
  DocumentKind,
  JsonObject,
  JsonValue,
  JsonPrimitive,
} from './domain/index.js';

export * from './application/index.js';
export { parseJsonPath, documentPath, compileQuery } from './application/query/index.js';
export type { QueryBody, QueryRequest, QueryFilter, CompiledQuery, CompileLimits } from './application/query/index.js';

export { loadStoreConfig } from './infrastructure/config.js';
export type { StoreConfig, LogLevel } from './infrastructure/config.js';
export { ConnectionPool, ensureSchema, SCHEMA_STATEMENTS, renderQuery, toStoreError } from './infrastructure/db/index.js';
export type { PoolConfig, QueryRunner, RunOptions, QueryMatch, QueryElement } from './infrastructure/db/index.js';
