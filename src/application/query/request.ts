import { z } from 'zod';
import { jsonValueSchema, MAX_INT4 } from '../document-schema.js';

export const filterOperatorSchema = z.enum(['eq', 'ne', 'in', 'contains', 'lt', 'gt', 'lte', 'gte', 'like']);

export const queryFilterSchema = z.object({
  path: z.string().min(1),
  operator: filterOperatorSchema,
  value: jsonValueSchema,
});

/** Request body without the `from` selector; shared by the typed entry points. */
export const queryBodySchema = z.object({
  filters: z.array(queryFilterSchema).default([]),
  explode: z.object({
    path: z.string().min(1),
    as: z.string().min(1),
  }).optional(),
  sort: z.object({
    path: z.string().min(1),
    direction: z.enum(['asc', 'desc']).default('asc'),
  }).optional(),
  limit: z.number().int().optional(),
  offset: z.number().int().max(MAX_INT4).optional(),
});

export const queryRequestSchema = queryBodySchema.extend({
  from: z.enum(['entities', 'curations']),
});

export type QueryFilter = z.input<typeof queryFilterSchema>;
export type QueryBody = z.input<typeof queryBodySchema>;
export type ParsedQueryBody = z.output<typeof queryBodySchema>;
export type QueryRequest = z.input<typeof queryRequestSchema>;
