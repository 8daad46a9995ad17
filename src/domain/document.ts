/**
 * Core domain types for the entity/curation document model.
 *
 * Document bodies are opaque JSON trees. Nothing outside the schema
 * validators looks at their shape beyond the required top-level keys.
 */

export type JsonPrimitive = string | number | boolean | null;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

/** Entity kinds accepted by the `entities.type` column. */
export const ENTITY_TYPES = ['restaurant', 'hotel', 'attraction', 'event', 'other'] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

/** The two document tables. */
export type DocumentKind = 'entities' | 'curations';

/**
 * A curatable subject. `id` and `type` are fixed at creation;
 * `version` starts at 1 and moves by exactly one per update.
 */
export interface Entity {
  readonly id: string;
  readonly type: EntityType;
  readonly document: JsonObject;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly version: number;
}

/** One curator's annotation of an entity. Deleted with its entity. */
export interface Curation {
  readonly id: string;
  readonly entityId: string;
  readonly document: JsonObject;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly version: number;
}

/** Top-level document keys the store refuses to go without. */
export const REQUIRED_KEYS: Record<DocumentKind, readonly string[]> = {
  entities: ['name', 'metadata'],
  curations: ['curator', 'categories'],
};
