export {
  createEntity,
  getEntity,
  updateEntityMerge,
  removeEntity,
  listEntitiesByType,
  searchEntitiesByName,
} from './entity-crud.js';
export type { CreateEntityInput } from './entity-crud.js';
export {
  createCuration,
  getCuration,
  updateCurationMerge,
  removeCuration,
  listCurationsForEntity,
  findCurationsByCategoryConcept,
  findCurationsByCurator,
} from './curation-crud.js';
export type { CreateCurationInput } from './curation-crud.js';
export { executeQuery, queryEntities, queryCurations } from './query-documents.js';
export type { QueryOptions, QueryResult, DocumentQueryResult } from './query-documents.js';
export type { CallOptions, PageParams } from './validation.js';
export {
  jsonValueSchema,
  jsonObjectSchema,
  entityDocumentSchema,
  curationDocumentSchema,
  createEntitySchema,
  createCurationSchema,
  documentPatchSchemas,
} from './document-schema.js';
