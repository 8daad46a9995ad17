export { entities, curations } from './schema.js';
export type { EntityRow, CurationRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClient, DbClientOptions } from './client.js';
export { ConnectionPool } from './pool.js';
export type { PoolConfig, QueryRunner, RunOptions } from './pool.js';
export { toStoreError } from './errors.js';
export { ensureSchema, SCHEMA_STATEMENTS } from './migrate.js';
export type { SchemaExecutor } from './migrate.js';
export { insertEntity, findEntityById, mergeEntityDocument, deleteEntity } from './entity-repository.js';
export type { InsertEntityInput, EntityMergeResult } from './entity-repository.js';
export { insertCuration, findCurationById, mergeCurationDocument, deleteCuration } from './curation-repository.js';
export type { InsertCurationInput, CurationMergeResult } from './curation-repository.js';
export { selectEntities, selectCurations } from './document-query-repository.js';
export type { QueryMatch, QueryElement } from './document-query-repository.js';
export { renderQuery } from './query-renderer.js';
