import { sql } from 'drizzle-orm';
import { pgTable, varchar, timestamp, jsonb, integer, index, check } from 'drizzle-orm/pg-core';
import { ENTITY_TYPES } from '../../domain/index.js';
import type { JsonObject } from '../../domain/index.js';

/**
 * Drizzle schema for the `entities` table.
 *
 * `id` is caller-supplied. Everything with a flexible shape lives in `doc`;
 * the functional indexes below are expressions over it, so adding one never
 * changes the table shape. The CHECKs mirror the application-level document
 * validation for writers that bypass this library.
 */
export const entities = pgTable('entities', {
  id: varchar('id', { length: 128 }).primaryKey(),
  type: varchar('type', { length: 64, enum: ENTITY_TYPES }).notNull(),
  doc: jsonb('doc').$type<JsonObject>().notNull(),
  created_at: timestamp('created_at', { withTimezone: true, precision: 3 }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true, precision: 3 }).notNull().defaultNow(),
  version: integer('version').notNull().default(1),
}, (table) => [
  index('idx_entities_type_updated').on(table.type, table.updated_at.desc()),
  index('idx_entities_created').on(table.created_at.desc()),
  index('idx_entities_name_lower').on(sql`lower(${table.doc} ->> 'name')`),
  index('idx_entities_status').on(sql`(${table.doc} ->> 'status')`),
  index('idx_entities_sync_status').on(sql`(${table.doc} -> 'sync' ->> 'status')`),
  check('entities_type_check', sql`${table.type} in (${sql.raw(ENTITY_TYPES.map((t) => `'${t}'`).join(', '))})`),
  check('entities_doc_check', sql`jsonb_typeof(${table.doc}) = 'object'
    and coalesce(jsonb_typeof(${table.doc} -> 'name'), '') = 'string'
    and coalesce(jsonb_typeof(${table.doc} -> 'metadata'), '') = 'array'`),
  check('entities_version_check', sql`${table.version} > 0`),
]);

/**
 * Drizzle schema for the `curations` table.
 *
 * `entity_id` is a real FK with ON DELETE CASCADE: deleting an entity
 * removes its curations in the same statement.
 */
export const curations = pgTable('curations', {
  id: varchar('id', { length: 128 }).primaryKey(),
  entity_id: varchar('entity_id', { length: 128 }).notNull()
    .references(() => entities.id, { onDelete: 'cascade' }),
  doc: jsonb('doc').$type<JsonObject>().notNull(),
  created_at: timestamp('created_at', { withTimezone: true, precision: 3 }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true, precision: 3 }).notNull().defaultNow(),
  version: integer('version').notNull().default(1),
}, (table) => [
  index('idx_curations_entity').on(table.entity_id),
  index('idx_curations_updated').on(table.updated_at.desc()),
  index('idx_curations_curator').on(sql`(${table.doc} -> 'curator' ->> 'id')`),
  check('curations_doc_check', sql`jsonb_typeof(${table.doc}) = 'object'
    and coalesce(jsonb_typeof(${table.doc} -> 'curator'), '') = 'object'
    and coalesce(jsonb_typeof(${table.doc} -> 'categories'), '') = 'object'`),
  check('curations_version_check', sql`${table.version} > 0`),
]);

export type EntityRow = typeof entities.$inferSelect;
export type CurationRow = typeof curations.$inferSelect;
