export type {
  JsonPrimitive,
  JsonObject,
  JsonValue,
  EntityType,
  DocumentKind,
  Entity,
  Curation,
} from './document.js';
export { ENTITY_TYPES, REQUIRED_KEYS } from './document.js';
export type { StoreErrorKind } from './errors.js';
export { DocumentStoreError, isStoreError, isCallerError } from './errors.js';
