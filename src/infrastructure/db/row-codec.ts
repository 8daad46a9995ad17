import { z } from 'zod';
import { ENTITY_TYPES } from '../../domain/index.js';
import type { Curation, Entity, JsonValue } from '../../domain/index.js';
import { jsonObjectSchema, jsonValueSchema } from '../../application/document-schema.js';
import type { CurationRow, EntityRow } from './schema.js';
import { EXPLODED_VALUE_COLUMN } from './query-renderer.js';

/**
 * Decoders for rows coming back from raw (`db.execute`) statements, where
 * Drizzle's column mapping does not apply. The postgres-js driver leaves
 * timestamps as text; `jsonb` is parsed by postgres.js itself.
 */

const timestampColumn = z
  .union([z.date(), z.string()])
  .transform((value) => (value instanceof Date ? value : new Date(value)))
  .refine((date) => !Number.isNaN(date.getTime()), { message: 'Invalid timestamp' });

const versionColumn = z.coerce.number().int().positive();

const entityRowSchema = z.object({
  id: z.string(),
  type: z.enum(ENTITY_TYPES),
  doc: jsonObjectSchema,
  created_at: timestampColumn,
  updated_at: timestampColumn,
  version: versionColumn,
});

const curationRowSchema = z.object({
  id: z.string(),
  entity_id: z.string(),
  doc: jsonObjectSchema,
  created_at: timestampColumn,
  updated_at: timestampColumn,
  version: versionColumn,
});

const explodedValueSchema = z.object({
  [EXPLODED_VALUE_COLUMN]: jsonValueSchema.optional(),
});

export function toEntity(row: EntityRow): Entity {
  return {
    id: row.id,
    type: row.type,
    document: row.doc,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    version: row.version,
  };
}

export function toCuration(row: CurationRow): Curation {
  return {
    id: row.id,
    entityId: row.entity_id,
    document: row.doc,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    version: row.version,
  };
}

export function decodeEntityRow(row: unknown): Entity {
  return toEntity(entityRowSchema.parse(row));
}

export function decodeCurationRow(row: unknown): Curation {
  return toCuration(curationRowSchema.parse(row));
}

/**
 * The exploded element of a row. A JSON `null` element decodes to `null`;
 * the column is only missing when the query did not explode.
 */
export function decodeExplodedValue(row: unknown): JsonValue {
  const value = explodedValueSchema.parse(row)[EXPLODED_VALUE_COLUMN];
  return value === undefined ? null : value;
}
