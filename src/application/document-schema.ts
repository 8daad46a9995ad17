import { z } from 'zod';
import { ENTITY_TYPES } from '../domain/index.js';
import type { JsonObject, JsonValue, DocumentKind } from '../domain/index.js';

/** Largest Postgres `integer`: the type of the version column. */
export const MAX_INT4 = 2_147_483_647;

const hasNoNul = (s: string) => !s.includes('\u0000');
const NUL_MESSAGE = 'Must not contain the NUL character (U+0000)';

/** `jsonb` and `text` cannot hold U+0000. */
const jsonString = z.string().refine(hasNoNul, { message: NUL_MESSAGE });

/** Parsed objects are rebuilt by assignment, which would drop an own `__proto__` key. */
const jsonKey = jsonString.refine((key) => key !== '__proto__', { message: 'Key "__proto__" is not allowed' });

/**
 * Opaque JSON tree. Non-finite numbers are rejected because they have no
 * JSON encoding and would not survive the round trip through `jsonb`.
 */
export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    jsonString,
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonKey, jsonValueSchema),
  ]),
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonKey, jsonValueSchema);

const nonBlank = jsonString.refine((s) => s.trim().length > 0, { message: 'Must not be blank' });

const recordId = z.string().min(1).max(128).refine(hasNoNul, { message: NUL_MESSAGE });

/**
 * Entity document body.
 *
 * Only `name` and `metadata` are required; every other key passes through
 * untouched so the stored document round-trips exactly. The keys are
 * checked as a plain JSON object first.
 */
export const entityDocumentSchema = jsonObjectSchema.pipe(
  z
    .object({
      name: nonBlank,
      metadata: z.array(jsonValueSchema),
    })
    .catchall(jsonValueSchema),
);

/** Curation document body: `curator` and `categories` must be objects. */
export const curationDocumentSchema = jsonObjectSchema.pipe(
  z
    .object({
      curator: jsonObjectSchema,
      categories: jsonObjectSchema,
    })
    .catchall(jsonValueSchema),
);

export const createEntitySchema = z.object({
  id: recordId,
  type: z.enum(ENTITY_TYPES),
  document: entityDocumentSchema,
});

export type CreateEntityInput = z.input<typeof createEntitySchema>;

export const createCurationSchema = z.object({
  id: recordId,
  entityId: recordId,
  document: curationDocumentSchema,
});

export type CreateCurationInput = z.input<typeof createCurationSchema>;

/**
 * Merge patch bodies.
 *
 * A patch may touch any key, but a required key can only be replaced by a
 * value of the right shape: `null` would delete it under merge-patch rules.
 */
const requiredKeyRules: Record<DocumentKind, Record<string, z.ZodTypeAny>> = {
  entities: { name: nonBlank, metadata: z.array(jsonValueSchema) },
  curations: { curator: jsonObjectSchema, categories: jsonObjectSchema },
};

function patchSchemaFor(kind: DocumentKind) {
  return jsonObjectSchema.superRefine((patch, ctx) => {
    for (const [key, rule] of Object.entries(requiredKeyRules[kind])) {
      if (!(key in patch)) continue;
      if (!rule.safeParse(patch[key]).success) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Required key "${key}" cannot be removed or replaced with a value of another shape`,
        });
      }
    }
  });
}

export const documentPatchSchemas = {
  entities: patchSchemaFor('entities'),
  curations: patchSchemaFor('curations'),
} satisfies Record<DocumentKind, z.ZodType<JsonObject>>;

export const expectedVersionSchema = z.number().int().min(1).max(MAX_INT4);
